export const MODEL_NAMES = [
  "gemini-3.0-pro",
  "gemini-2.5-pro",
  "gemini-2.5-flash",
  "unspecified",
] as const;

export type ModelName = (typeof MODEL_NAMES)[number];

export const DEFAULT_MODEL: ModelName = "gemini-2.5-flash";

const DESCRIPTIONS: Record<ModelName, string> = {
  "gemini-3.0-pro": "Gemini 3.0 Pro",
  "gemini-2.5-pro": "Gemini 2.5 Pro",
  "gemini-2.5-flash": "Gemini 2.5 Flash (Default)",
  unspecified: "Unspecified model",
};

function isModelName(value: string): value is ModelName {
  return (MODEL_NAMES as readonly string[]).includes(value);
}

/** Unknown or missing selectors fall back to the default model instead of failing. */
export function resolveModel(selector: string | undefined): ModelName {
  return selector !== undefined && isModelName(selector) ? selector : DEFAULT_MODEL;
}

export function listModels(): Array<{ name: ModelName; description: string }> {
  return MODEL_NAMES.map((name) => ({ name, description: DESCRIPTIONS[name] }));
}
