import { z } from "zod";
import { LineActions, type Script } from "./types.ts";

const lineId = z.number().int().safe();

export const TalkerSchema = z.object({
  name: z.string().min(1),
  asset: z.string(),
});

export const ChoiceSchema = z.object({
  text: z.string(),
  next: lineId,
});

export const DialogueLineSchema = z.object({
  id: lineId,
  text: z.string(),
  talker: z.string().optional(),
  talkers: z.array(z.string()).optional(),
  action: z.enum(LineActions).optional(),
  choices: z.array(ChoiceSchema).optional(),
  next: lineId.optional(),
  start: z.boolean().optional(),
  end: z.boolean().optional(),
});

export const ScriptSchema: z.ZodType<Script, z.ZodTypeDef, unknown> = z.object({
  talkers: z.array(TalkerSchema).default([]),
  lines: z.array(DialogueLineSchema),
});
