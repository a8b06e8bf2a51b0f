import { readFile } from "node:fs/promises";
import {
  createChatResponse,
  createGenerateResponse,
  type ChatRequestBody,
  type ChatResponsePayload,
  type GenerateRequestBody,
  type GenerateResponsePayload,
} from "./api-types.js";
import { fingerprint } from "./auth.js";
import { GatewayError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { DEFAULT_MODEL, resolveModel, type ModelName } from "./models.js";
import type { SessionProvider } from "./session/types.js";
import { withScratchDir, withStagedAttachments, type Attachment } from "./staging.js";
import { withSpan } from "./tracing.js";
import { RemoteImage } from "./upstream/remote-image.js";
import type { IdentityTokens, ModelOutput, UpstreamClient, UpstreamImage } from "./upstream/types.js";

/** Phrasings tried in order until the model answers with an image. */
export const IMAGE_PROMPT_TEMPLATES: ReadonlyArray<(prompt: string) => string> = [
  (p) => `Create an image of ${p}`,
  (p) => `Generate a picture showing ${p}`,
  (p) => `Draw ${p}`,
  (p) => `Make an image: ${p}`,
];

export const GENERATED_IMAGE_MARKER = "googleusercontent.com/image_generation_content";

export const DIAGNOSTIC_PROMPT = "Create a simple drawing of a red apple";

type ImageAttempt =
  | { ok: true; output: ModelOutput; images: UpstreamImage[] }
  | { ok: false; reason: string };

export interface FileGenerationInput {
  prompt: string;
  model?: string;
  files: Attachment[];
}

export interface ImageEditInput {
  prompt: string;
  model?: string;
  image: Attachment;
}

export type DiagnosticResult =
  | {
      success: true;
      text: string;
      images_count: number;
      images: Array<{ url: string; title: string }>;
      thoughts: string | null;
    }
  | { success: false; error: string; error_type: string };

export interface GatewayConfig {
  sessions: SessionProvider;
  logger?: Logger;
}

export function classifyImageUrl(url: string): UpstreamImage["kind"] {
  return url.includes(GENERATED_IMAGE_MARKER) ? "generated" : "web";
}

/** Ids of the conversation to resume, in order, leaving out the ones not supplied. */
export function continuationMetadata(body: ChatRequestBody): string[] | undefined {
  const metadata = [body.chat_id, body.reply_id, body.reply_candidate_id].filter(
    (value): value is string => typeof value === "string" && value.length > 0
  );
  return metadata.length > 0 ? metadata : undefined;
}

export class Gateway {
  private readonly sessions: SessionProvider;
  private readonly logger: Logger;

  constructor(config: GatewayConfig) {
    this.sessions = config.sessions;
    this.logger = config.logger ?? createLogger({ level: "warn" });
  }

  async generate(tokens: IdentityTokens, body: GenerateRequestBody): Promise<GenerateResponsePayload> {
    const client = await this.sessions.acquire(tokens);
    const model = resolveModel(body.model);
    const output = await this.call("generate", "Failed to generate content", tokens, model, () =>
      client.generateContent({ prompt: body.prompt, model })
    );
    return createGenerateResponse(output);
  }

  async chat(tokens: IdentityTokens, body: ChatRequestBody): Promise<ChatResponsePayload> {
    const client = await this.sessions.acquire(tokens);
    const model = resolveModel(body.model);
    const metadata = continuationMetadata(body);
    const output = await this.call("chat", "Failed to chat", tokens, model, () =>
      client.startChat({ metadata, model }).sendMessage(body.prompt)
    );
    return createChatResponse(output);
  }

  async generateImage(tokens: IdentityTokens, body: GenerateRequestBody): Promise<GenerateResponsePayload> {
    const client = await this.sessions.acquire(tokens);
    const model = resolveModel(body.model);

    let lastReason: string | undefined;
    for (const [index, template] of IMAGE_PROMPT_TEMPLATES.entries()) {
      const attempt = await withSpan(
        "upstream.generate_image",
        { model, attempt: index + 1 },
        () => this.attemptImage(client, template(body.prompt), model)
      );
      if (attempt.ok) {
        this.logger.debug("image generated", { session: fingerprint(tokens), attempt: index + 1 });
        return createGenerateResponse(attempt.output, attempt.images);
      }
      this.logger.debug("image attempt failed", { attempt: index + 1, reason: attempt.reason });
      lastReason = attempt.reason;
    }

    throw new GatewayError(
      "IMAGE_GENERATION_EXHAUSTED",
      `Failed to generate image: ${lastReason ?? "Failed to generate image with all prompt variations"}`
    );
  }

  private async attemptImage(client: UpstreamClient, prompt: string, model: ModelName): Promise<ImageAttempt> {
    let output: ModelOutput;
    try {
      output = await client.generateContent({ prompt, model });
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }

    const images = output.images
      .filter((image) => image.url.length > 0)
      .map((image) => ({ ...image, kind: classifyImageUrl(image.url) }));
    if (images.length === 0) {
      return { ok: false, reason: `No images generated with prompt: ${prompt}` };
    }
    return { ok: true, output, images };
  }

  async editImage(tokens: IdentityTokens, input: ImageEditInput): Promise<GenerateResponsePayload> {
    const client = await this.sessions.acquire(tokens);
    const model = resolveModel(input.model);
    const output = await withStagedAttachments([input.image], this.logger, (files) =>
      this.call("edit_image", "Failed to edit image", tokens, model, () =>
        client.generateContent({ prompt: `Edit this image: ${input.prompt}`, model, files })
      )
    );
    return createGenerateResponse(output);
  }

  async generateWithFiles(tokens: IdentityTokens, input: FileGenerationInput): Promise<GenerateResponsePayload> {
    const client = await this.sessions.acquire(tokens);
    const model = resolveModel(input.model);
    const output = await withStagedAttachments(input.files, this.logger, (files) =>
      this.call("generate_with_files", "Failed to generate content with files", tokens, model, () =>
        client.generateContent({ prompt: input.prompt, model, files })
      )
    );
    return createGenerateResponse(output);
  }

  /** Fetches an upstream image with the caller's full session cookie set. */
  async downloadImage(tokens: IdentityTokens, url: string): Promise<ArrayBuffer> {
    try {
      const client = await this.sessions.acquire(tokens);
      const image = new RemoteImage({ url, title: "Downloaded Image", cookies: client.cookies });
      return await withScratchDir(this.logger, async (dir) => {
        const saved = await withSpan("upstream.download_image", {}, () => image.save(dir, "temp_image.png"));
        return Uint8Array.from(await readFile(saved)).buffer;
      });
    } catch (error) {
      throw new GatewayError("PROXY_FETCH", `Error downloading image: ${errorMessage(error)}`, error);
    }
  }

  /** Single fixed image prompt; reports failures in the body instead of as an error status. */
  async testImageGeneration(tokens: IdentityTokens): Promise<DiagnosticResult> {
    const client = await this.sessions.acquire(tokens);
    try {
      const output = await client.generateContent({ prompt: DIAGNOSTIC_PROMPT, model: DEFAULT_MODEL });
      return {
        success: true,
        text: output.text,
        images_count: output.images.length,
        images: output.images.map((image) => ({ url: image.url, title: image.title })),
        thoughts: output.thoughts,
      };
    } catch (error) {
      return {
        success: false,
        error: errorMessage(error),
        error_type: error instanceof Error ? error.name : typeof error,
      };
    }
  }

  private async call(
    operation: string,
    failurePrefix: string,
    tokens: IdentityTokens,
    model: ModelName,
    fn: () => Promise<ModelOutput>
  ): Promise<ModelOutput> {
    const session = fingerprint(tokens);
    const start = Date.now();
    try {
      const output = await withSpan(`upstream.${operation}`, { model }, fn);
      this.logger.debug("upstream call complete", {
        operation,
        session,
        model,
        images: output.images.length,
        duration_ms: Date.now() - start,
      });
      return output;
    } catch (error) {
      this.logger.error("upstream call failed", { operation, session, model, error: errorMessage(error) });
      throw new GatewayError("UPSTREAM_FAILURE", `${failurePrefix}: ${errorMessage(error)}`, error);
    }
  }
}
