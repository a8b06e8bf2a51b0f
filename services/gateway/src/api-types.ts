import { z } from "zod";
import type { ModelOutput, UpstreamImage } from "./upstream/types.js";

export const GenerateRequestSchema = z.object({
  prompt: z.string(),
  model: z.string().optional(),
});

export type GenerateRequestBody = z.infer<typeof GenerateRequestSchema>;

export const ChatRequestSchema = GenerateRequestSchema.extend({
  chat_id: z.string().nullish(),
  reply_id: z.string().nullish(),
  reply_candidate_id: z.string().nullish(),
});

export type ChatRequestBody = z.infer<typeof ChatRequestSchema>;

export const EditImageFormSchema = z.object({
  prompt: z.string(),
  model: z.string().optional(),
  image: z.instanceof(File),
});

export const FilesFormSchema = z.object({
  prompt: z.string(),
  model: z.string().optional(),
  files: z
    .union([z.instanceof(File), z.array(z.instanceof(File)).min(1)])
    .transform((files) => (Array.isArray(files) ? files : [files])),
});

export const DownloadQuerySchema = z.object({
  url: z.string().min(1),
});

export interface ImagePayload {
  url: string;
  title: string;
  alt: string;
  type: UpstreamImage["kind"];
}

export interface ChatMetadataPayload {
  chat_id: string | null;
  reply_id: string | null;
  reply_candidate_id: string | null;
}

export interface GenerateResponsePayload {
  text: string;
  thoughts: string | null;
  images: ImagePayload[];
  chat_metadata: ChatMetadataPayload;
}

export interface ChatResponsePayload {
  text: string;
  thoughts: string | null;
  images: ImagePayload[];
  chat_id: string;
  reply_id: string;
  reply_candidate_id: string;
}

export function toImagePayload(image: UpstreamImage): ImagePayload {
  return { url: image.url, title: image.title, alt: image.alt, type: image.kind };
}

/** `images` overrides the output's own list, e.g. after reclassification. */
export function createGenerateResponse(
  output: ModelOutput,
  images: UpstreamImage[] = output.images
): GenerateResponsePayload {
  return {
    text: output.text,
    thoughts: output.thoughts,
    images: images.map(toImagePayload),
    chat_metadata: {
      chat_id: output.metadata[0] ?? null,
      reply_id: output.metadata[1] ?? null,
      reply_candidate_id: output.rcid,
    },
  };
}

/** Chat replies always carry the three conversation ids, empty when unknown. */
export function createChatResponse(output: ModelOutput): ChatResponsePayload {
  return {
    text: output.text,
    thoughts: output.thoughts,
    images: output.images.map(toImagePayload),
    chat_id: output.metadata[0] ?? "",
    reply_id: output.metadata[1] ?? "",
    reply_candidate_id: output.rcid,
  };
}
