import type { ModelName } from "../models.js";

export interface IdentityTokens {
  primary: string;
  secondary?: string;
}

/**
 * Images are tagged where the upstream result enters this system:
 * "web" for pictures the model fetched, "generated" for ones it synthesized.
 */
export interface UpstreamImage {
  kind: "web" | "generated";
  url: string;
  title: string;
  alt: string;
}

export interface ModelOutput {
  text: string;
  thoughts: string | null;
  images: UpstreamImage[];
  /** Conversation identifiers in order: chat id, reply id. */
  metadata: string[];
  /** Reply candidate id. */
  rcid: string;
}

export interface InitOptions {
  timeoutMs: number;
  autoClose: boolean;
  autoRefresh: boolean;
}

export interface GenerateRequest {
  prompt: string;
  model: ModelName;
  /** Paths of files on local disk to attach. */
  files?: string[];
}

export interface ChatSession {
  sendMessage(prompt: string): Promise<ModelOutput>;
}

export interface UpstreamClient {
  /** False once the upstream side has invalidated or closed the session. */
  readonly running: boolean;
  /** Full cookie set the session currently authenticates with. */
  readonly cookies: Record<string, string>;
  init(options: InitOptions): Promise<void>;
  generateContent(request: GenerateRequest): Promise<ModelOutput>;
  startChat(options: { metadata?: string[]; model: ModelName }): ChatSession;
  close(): Promise<void>;
}

export type UpstreamClientFactory = (tokens: IdentityTokens) => UpstreamClient;
