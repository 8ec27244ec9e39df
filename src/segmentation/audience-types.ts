import type { z } from 'zod';
import type { audiencePackSchema, audienceRecordSchema } from './schema';

/** The four answers collected by the dialogue. */
export interface ProjectBrief {
  city: string;
  complexName: string;
  description: string;
  deliveryYear: string;
}

export type AudienceRecord = z.infer<typeof audienceRecordSchema>;

/** Exactly five records, in the order the model returned them. */
export type AudiencePack = z.infer<typeof audiencePackSchema>['audiences'];

export type GenerationFailureReason =
  | 'request_failed'
  | 'empty_response'
  | 'invalid_json'
  | 'schema_mismatch';

export type GenerationResult =
  | { ok: true; audiences: AudiencePack }
  | { ok: false; reason: GenerationFailureReason; message: string };
