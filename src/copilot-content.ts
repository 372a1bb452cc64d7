import { z } from 'zod';
import { ApiError } from './errors';

const operatorSchema = z.object({
  name: z.string().trim().min(1),
  id: z.string().trim().min(1).optional(),
  skill: z.number().int().min(0).max(3).optional()
});

/**
 * Fields the service reads from an uploaded copilot. Everything else in the
 * document is kept verbatim in the stored content string.
 */
export const copilotContentSchema = z.object({
  stage_name: z.string().trim().min(1),
  stage_code: z.string().trim().min(1).optional(),
  minimum_required: z.string().trim().min(1),
  doc: z.object({
    title: z.string().trim().min(1),
    details: z.string().optional()
  }),
  opers: z.array(operatorSchema).default([]),
  actions: z.array(z.unknown()).default([])
});

export type CopilotContent = z.infer<typeof copilotContentSchema>;

export const parseCopilotContent = (raw: string): CopilotContent => {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch {
    throw new ApiError(400, 'Copilot content is not valid JSON');
  }
  const parsed = copilotContentSchema.safeParse(document);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const location = issue && issue.path.length ? `${issue.path.join('.')}: ` : '';
    throw new ApiError(400, `Invalid copilot content: ${location}${issue?.message ?? 'unexpected shape'}`);
  }
  return parsed.data;
};
