/**
 * Optional sentence-level entity recognizer for the target/indication extractor.
 * Uses an AI SDK model (OpenAI when OPENAI_API_KEY is set); callers treat failures as "no entities".
 */

import { generateObject, type LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { z } from "zod";

export interface EntityRecognizer {
  recognize(text: string): Promise<string[]>;
}

export const RecognizedEntitiesSchema = z.object({
  entities: z
    .array(z.string())
    .describe("Named entities exactly as written: genes, proteins, receptors, enzymes, diseases, cancers"),
});

const SYSTEM = `You are a biomedical named-entity recognizer. List the gene, protein, receptor, enzyme and disease names that appear in the text, copied verbatim. Do not add entities that are not in the text.`;

const MAX_INPUT_CHARS = 4000;

export async function recognizeEntities(model: LanguageModel, text: string): Promise<string[]> {
  const trimmed = text.slice(0, MAX_INPUT_CHARS).trim();
  if (!trimmed) return [];
  const { object } = await generateObject({
    model,
    system: SYSTEM,
    prompt: `Extract named entities from this passage.\n\n---\n${trimmed}\n---`,
    schema: RecognizedEntitiesSchema,
    maxTokens: 512,
  });
  return object.entities.map((e) => e.trim()).filter((e) => e.length > 0);
}

export function modelRecognizer(model: LanguageModel): EntityRecognizer {
  return { recognize: (text) => recognizeEntities(model, text) };
}

/** Recognizer backed by OpenAI, or null when no API key is configured. */
export function createEntityRecognizer(config: { apiKey?: string; model?: string }): EntityRecognizer | null {
  if (!config.apiKey) return null;
  const provider = createOpenAI({ apiKey: config.apiKey });
  return modelRecognizer(provider(config.model ?? "gpt-4o-mini"));
}
