/**
 * Trace records: one per executed tool call, in execution order
 */

import { z } from 'zod';

const ReadRecordSchema = z.object({
  type: z.literal('read'),
  call_id: z.string(),
  path: z.string(),
  ok: z.boolean(),
});

const WriteRecordSchema = z.object({
  type: z.literal('write'),
  call_id: z.string(),
  path: z.string(),
  bytes: z.number(),
  ok: z.boolean(),
});

const ShellRecordSchema = z.object({
  type: z.literal('shell'),
  call_id: z.string(),
  command: z.string(),
  exit_code: z.number(),
  ok: z.boolean(),
});

const UnknownRecordSchema = z.object({
  type: z.literal('unknown'),
  call_id: z.string(),
  name: z.string(),
  ok: z.boolean(),
});

export const ToolCallRecordSchema = z.discriminatedUnion('type', [
  ReadRecordSchema,
  WriteRecordSchema,
  ShellRecordSchema,
  UnknownRecordSchema,
]);

export type ToolCallRecord = z.infer<typeof ToolCallRecordSchema>;
export type ShellCallRecord = z.infer<typeof ShellRecordSchema>;
export type ReadCallRecord = z.infer<typeof ReadRecordSchema>;
