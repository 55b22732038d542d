import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import { CHECKPOINT_TYPES } from "../trip/types";
import type { GuidancePassage } from "./types";

const passageSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  checkpointTypes: z.array(z.enum(CHECKPOINT_TYPES)).default([]),
  tags: z.array(z.string()).default([]),
  stations: z.array(z.string()).optional(),
});

const corpusSchema = z.array(passageSchema).superRefine((passages, ctx) => {
  const seen = new Set<string>();
  for (const p of passages) {
    if (seen.has(p.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate passage id: ${p.id}` });
    }
    seen.add(p.id);
  }
});

export const DEFAULT_CORPUS_PATH = fileURLToPath(new URL("./passages.json", import.meta.url));

export function parsePassageCorpus(raw: unknown): GuidancePassage[] {
  return corpusSchema.parse(raw);
}

export function loadPassageCorpus(path: string = DEFAULT_CORPUS_PATH): GuidancePassage[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parsePassageCorpus(raw);
}
