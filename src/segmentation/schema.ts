import { z } from 'zod';

export const AUDIENCE_COUNT = 5;
export const AUDIENCE_PACK_SCHEMA_NAME = 'audience_pack';

const audienceItemSchema = {
  type: 'object',
  additionalProperties: false,
  required: [
    'name',
    'description',
    'main_job',
    'trigger',
    'critical_subtasks',
    'digital_marketing_recos',
  ],
  properties: {
    name: { type: 'string' },
    description: { type: 'string' },
    main_job: { type: 'string' },
    trigger: { type: 'string' },
    critical_subtasks: {
      type: 'array',
      minItems: 3,
      maxItems: 6,
      items: { type: 'string' },
    },
    digital_marketing_recos: {
      type: 'array',
      minItems: 4,
      maxItems: 8,
      items: { type: 'string' },
    },
  },
};

/** Sent to the completion API as the strict response contract. */
export const audiencePackJsonSchema: Record<string, unknown> = {
  type: 'object',
  additionalProperties: false,
  required: ['audiences'],
  properties: {
    audiences: {
      type: 'array',
      minItems: AUDIENCE_COUNT,
      maxItems: AUDIENCE_COUNT,
      items: audienceItemSchema,
    },
  },
};

// Local mirror of audiencePackJsonSchema; the model output is re-checked against it.
export const audienceRecordSchema = z
  .object({
    name: z.string(),
    description: z.string(),
    main_job: z.string(),
    trigger: z.string(),
    critical_subtasks: z.array(z.string()).min(3).max(6),
    digital_marketing_recos: z.array(z.string()).min(4).max(8),
  })
  .strict();

export const audiencePackSchema = z
  .object({
    audiences: z.tuple([
      audienceRecordSchema,
      audienceRecordSchema,
      audienceRecordSchema,
      audienceRecordSchema,
      audienceRecordSchema,
    ]),
  })
  .strict();
