import { describe, it, expect } from "vitest";
import { access, readFile, unlink } from "node:fs/promises";
import { basename, dirname } from "node:path";
import { withScratchDir, withStagedAttachments } from "../staging.js";
import { GatewayError } from "../errors.js";
import { createLogger } from "../logger.js";

function capture() {
  const lines: string[] = [];
  const logger = createLogger({ level: "warn", pretty: false, output: (line) => lines.push(line) });
  return { lines, logger };
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

describe("withStagedAttachments", () => {
  it("writes each attachment under its own name with the original extension", async () => {
    const { logger } = capture();
    let seen: Array<{ name: string; content: string }> = [];

    const paths = await withStagedAttachments(
      [
        { filename: "../../etc/photo.jpeg", data: new TextEncoder().encode("one") },
        { filename: "no-extension", data: new TextEncoder().encode("two") },
      ],
      logger,
      async (staged) => {
        seen = await Promise.all(
          staged.map(async (p) => ({ name: basename(p), content: await readFile(p, "utf8") }))
        );
        return staged;
      }
    );

    expect(seen).toEqual([
      { name: "attachment-0.jpeg", content: "one" },
      { name: "attachment-1", content: "two" },
    ]);
    expect(dirname(paths[0]!)).toBe(dirname(paths[1]!));
    expect(await exists(paths[0]!)).toBe(false);
    expect(await exists(dirname(paths[0]!))).toBe(false);
  });

  it("releases files when the callback throws and rethrows its error", async () => {
    const { logger } = capture();
    let staged: string[] = [];

    await expect(
      withStagedAttachments([{ filename: "a.png", data: new Uint8Array([1]) }], logger, async (paths) => {
        staged = paths;
        throw new Error("upstream failed");
      })
    ).rejects.toThrow("upstream failed");

    expect(await exists(staged[0]!)).toBe(false);
  });

  it("logs and swallows release failures", async () => {
    const { lines, logger } = capture();

    const result = await withStagedAttachments(
      [{ filename: "a.txt", data: new Uint8Array([1]) }],
      logger,
      async (paths) => {
        await unlink(paths[0]!);
        return "done";
      }
    );

    expect(result).toBe("done");
    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]!) as { level: string; msg: string };
    expect(entry.level).toBe("warn");
    expect(entry.msg).toBe("attachment release failed");
  });

  it("does not wrap errors from the callback as staging errors", async () => {
    const { logger } = capture();
    const error = await withStagedAttachments([], logger, async () => {
      throw new GatewayError("UPSTREAM_FAILURE", "boom");
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GatewayError);
    expect((error as GatewayError).code).toBe("UPSTREAM_FAILURE");
  });
});

describe("withScratchDir", () => {
  it("removes the directory and its contents afterwards", async () => {
    const { logger } = capture();
    let dir = "";

    await withScratchDir(logger, async (d) => {
      dir = d;
      expect(await exists(d)).toBe(true);
    });

    expect(dir).not.toBe("");
    expect(await exists(dir)).toBe(false);
  });
});
