import { Hono, type Context, type MiddlewareHandler } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import type { z } from "zod";
import {
  ChatRequestSchema,
  DownloadQuerySchema,
  EditImageFormSchema,
  FilesFormSchema,
  GenerateRequestSchema,
} from "./api-types.js";
import { DEFAULT_COOKIE_NAMES, extractIdentity, fingerprint, type CookieNames } from "./auth.js";
import { GatewayError } from "./errors.js";
import { Gateway } from "./gateway.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { createRateLimiter } from "./middleware/rate-limit.js";
import { listModels } from "./models.js";
import type { SessionProvider } from "./session/types.js";
import type { Attachment } from "./staging.js";
import type { IdentityTokens } from "./upstream/types.js";

type Env = { Variables: { identity: IdentityTokens } };

export const SERVICE_NAME = "session-gateway";
export const SERVICE_VERSION = "1.0.0";

const IDENTITY_PATHS = [
  "/generate",
  "/chat",
  "/generate-image",
  "/edit-image",
  "/generate-with-files",
  "/download-image",
  "/test-image-gen",
] as const;

export interface AppOptions {
  sessions: SessionProvider;
  logger?: Logger;
  cookieNames?: CookieNames;
  /** Per-identity limit on the content endpoints; omitted or rpm 0 disables it. */
  rateLimit?: { rpm: number; burst: number };
}

async function parseJson<S extends z.ZodType>(c: Context<Env>, schema: S): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new GatewayError("INVALID_REQUEST", "Request body must be valid JSON");
  }
  return validate(schema, body);
}

async function parseForm<S extends z.ZodType>(c: Context<Env>, schema: S): Promise<z.output<S>> {
  return validate(schema, await c.req.parseBody({ all: true }));
}

function validate<S extends z.ZodType>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    throw new GatewayError("INVALID_REQUEST", `Invalid request: ${details}`);
  }
  return parsed.data;
}

async function toAttachment(file: File): Promise<Attachment> {
  return { filename: file.name, data: new Uint8Array(await file.arrayBuffer()) };
}

export function createApp(options: AppOptions): Hono<Env> {
  const app = new Hono<Env>();
  const logger = options.logger ?? createLogger();
  const names = options.cookieNames ?? DEFAULT_COOKIE_NAMES;
  const gateway = new Gateway({ sessions: options.sessions, logger });

  // Request timing; registered first so it wraps auth and rate limiting
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    logger.info("http request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Date.now() - start,
    });
  });

  app.use("*", cors({ origin: (origin) => origin, credentials: true }));

  const requireIdentity: MiddlewareHandler<Env> = async (c, next) => {
    const identity = extractIdentity(c.req.header("cookie"), names);
    if (!identity) {
      throw new GatewayError(
        "MISSING_IDENTITY",
        `Missing required cookie: ${names.primary}. Please provide the session cookies in the Cookie header.`
      );
    }
    c.set("identity", identity);
    await next();
  };
  for (const path of IDENTITY_PATHS) app.use(path, requireIdentity);

  if (options.rateLimit && options.rateLimit.rpm > 0) {
    const limiter = createRateLimiter({
      ...options.rateLimit,
      keyFn: (c: Context<Env>) => fingerprint(c.get("identity")),
    });
    for (const path of IDENTITY_PATHS) app.use(path, limiter);
  }

  app.onError((err, c) => {
    if (err instanceof GatewayError) {
      const log = err.status >= 500 ? logger.error : logger.warn;
      log("request failed", { path: c.req.path, code: err.code, message: err.message });
      return c.json({ detail: err.message, code: err.code }, err.status);
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    logger.error("unexpected error", { path: c.req.path, error: String(err) });
    return c.json({ detail: "Internal server error" }, 500);
  });

  app.notFound((c) => c.json({ detail: "Not Found" }, 404));

  app.get("/", (c) =>
    c.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        "/generate": { method: "POST", description: "Generate text content" },
        "/chat": { method: "POST", description: "Chat with conversation history" },
        "/generate-image": { method: "POST", description: "Generate images" },
        "/edit-image": { method: "POST", description: "Edit images with multipart form" },
        "/generate-with-files": { method: "POST", description: "Generate content with file attachments" },
        "/download-image": { method: "GET", description: "Download a generated image through the caller's session" },
        "/models": { method: "GET", description: "List available models" },
        "/health": { method: "GET", description: "Health check" },
      },
      authentication: `Provide ${names.primary} and ${names.secondary} cookies in the Cookie header`,
    })
  );

  app.get("/health", (c) => c.json({ status: "healthy", service: SERVICE_NAME }));

  app.get("/models", (c) => c.json({ models: listModels() }));

  app.post("/generate", async (c) => {
    const body = await parseJson(c, GenerateRequestSchema);
    return c.json(await gateway.generate(c.get("identity"), body));
  });

  app.post("/chat", async (c) => {
    const body = await parseJson(c, ChatRequestSchema);
    return c.json(await gateway.chat(c.get("identity"), body));
  });

  app.post("/generate-image", async (c) => {
    const body = await parseJson(c, GenerateRequestSchema);
    return c.json(await gateway.generateImage(c.get("identity"), body));
  });

  app.post("/test-image-gen", async (c) => c.json(await gateway.testImageGeneration(c.get("identity"))));

  app.post("/edit-image", async (c) => {
    const form = await parseForm(c, EditImageFormSchema);
    const result = await gateway.editImage(c.get("identity"), {
      prompt: form.prompt,
      model: form.model,
      image: await toAttachment(form.image),
    });
    return c.json(result);
  });

  app.post("/generate-with-files", async (c) => {
    const form = await parseForm(c, FilesFormSchema);
    const result = await gateway.generateWithFiles(c.get("identity"), {
      prompt: form.prompt,
      model: form.model,
      files: await Promise.all(form.files.map(toAttachment)),
    });
    return c.json(result);
  });

  app.get("/download-image", async (c) => {
    const { url } = validate(DownloadQuerySchema, c.req.query());
    const bytes = await gateway.downloadImage(c.get("identity"), url);
    return c.body(bytes, 200, {
      "Content-Type": "image/png",
      "Content-Disposition": "inline",
      "Cache-Control": "public, max-age=3600",
    });
  });

  return app;
}
