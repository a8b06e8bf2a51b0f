import { mkdtemp, rm, unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { extname, join } from "node:path";
import { GatewayError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

export interface Attachment {
  filename: string;
  data: Uint8Array;
}

const PREFIX = "session-gateway-";

async function removeDir(dir: string, logger: Logger): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    logger.warn("scratch dir cleanup failed", { dir, error: errorMessage(error) });
  }
}

/** Runs `fn` with a fresh temporary directory that is removed afterwards. */
export async function withScratchDir<T>(
  logger: Logger,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), PREFIX));
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir, logger);
  }
}

/**
 * Writes each attachment to disk (keeping its extension, which the upstream
 * uses to detect the file type), runs `fn` with the paths, then releases them
 * whether `fn` succeeded or not. Release failures are logged and dropped.
 */
export async function withStagedAttachments<T>(
  attachments: Attachment[],
  logger: Logger,
  fn: (paths: string[]) => Promise<T>
): Promise<T> {
  let dir: string;
  try {
    dir = await mkdtemp(join(tmpdir(), PREFIX));
  } catch (error) {
    throw new GatewayError("ATTACHMENT_STAGING", `Failed to stage attachments: ${errorMessage(error)}`, error);
  }

  const staged: string[] = [];
  try {
    try {
      for (const [index, attachment] of attachments.entries()) {
        const path = join(dir, `attachment-${index}${extname(attachment.filename)}`);
        await writeFile(path, attachment.data);
        staged.push(path);
      }
    } catch (error) {
      throw new GatewayError("ATTACHMENT_STAGING", `Failed to stage attachments: ${errorMessage(error)}`, error);
    }
    return await fn(staged);
  } finally {
    for (const path of staged) {
      try {
        await unlink(path);
      } catch (error) {
        logger.warn("attachment release failed", { path, error: errorMessage(error) });
      }
    }
    await removeDir(dir, logger);
  }
}
