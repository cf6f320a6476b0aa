import { z } from 'zod';
import type { GenerationRequest, Stage } from '@envforge/shared';

/** What a backend process prints on stdout */
export const GeneratorResponseSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), artifact: z.string() }),
  z.object({ ok: z.literal(false), reason: z.string() }),
]);

export type GeneratorResponse = z.infer<typeof GeneratorResponseSchema>;

/**
 * The JSON document a backend process reads on stdin.
 */
export function encodeRequest(stage: Stage, request: GenerationRequest): string {
  return JSON.stringify({
    stage,
    round: request.round,
    hint: request.hint ?? null,
    instance: request.instance,
    bundle: request.bundle,
    reference: request.reference ?? null,
  });
}
