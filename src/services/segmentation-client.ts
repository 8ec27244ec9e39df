import type OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ServiceLogger } from '../core/types';
import type {
  GenerationFailureReason,
  GenerationResult,
  ProjectBrief,
} from '../segmentation/audience-types';
import {
  AUDIENCE_PACK_SCHEMA_NAME,
  audiencePackJsonSchema,
  audiencePackSchema,
} from '../segmentation/schema';
import {
  buildSegmentationSystemPrompt,
  buildSegmentationUserPrompt,
} from '../segmentation/system-prompt';

// Reasoning models (gpt-5, o-series) reject any temperature but the default.
const TEMPERATURE = 0.6;
const MAX_COMPLETION_TOKENS = 1800;

/** The part of a chat completion this client reads. */
export interface ChatCompletionPayload {
  choices: Array<{
    message: {
      content: string | null;
      refusal?: string | null;
    };
  }>;
}

export type CreateChatCompletion = (
  params: ChatCompletionCreateParamsNonStreaming,
) => Promise<ChatCompletionPayload>;

export function createOpenAiCompletion(openai: OpenAI): CreateChatCompletion {
  return (params) => openai.chat.completions.create(params);
}

export interface SegmentationClientConfig {
  createCompletion: CreateChatCompletion;
  model: string;
  logger: ServiceLogger;
}

export interface GenerationContext {
  chatId?: number;
}

export interface AudienceGenerator {
  generateAudiences(brief: ProjectBrief, context?: GenerationContext): Promise<GenerationResult>;
}

export class SegmentationClient implements AudienceGenerator {
  constructor(private readonly config: SegmentationClientConfig) {}

  async generateAudiences(
    brief: ProjectBrief,
    context: GenerationContext = {},
  ): Promise<GenerationResult> {
    let content: string;
    try {
      const completion = await this.config.createCompletion(this.buildRequest(brief));
      const message = completion.choices[0]?.message;
      if (!message || message.refusal || !message.content?.trim()) {
        return this.fail(context, 'empty_response', message?.refusal ?? 'Completion has no content');
      }
      content = message.content;
    } catch (error) {
      return this.fail(context, 'request_failed', errorMessage(error), error);
    }

    const payload = safeJsonParse(content);
    if (payload === undefined) {
      return this.fail(context, 'invalid_json', `Unparseable content: ${content.slice(0, 200)}`);
    }

    const parsed = audiencePackSchema.safeParse(payload);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      return this.fail(context, 'schema_mismatch', detail);
    }

    this.config.logger.info(
      { chatId: context.chatId, names: parsed.data.audiences.map((item) => item.name) },
      'Audience pack generated',
    );
    return { ok: true, audiences: parsed.data.audiences };
  }

  buildRequest(brief: ProjectBrief): ChatCompletionCreateParamsNonStreaming {
    return {
      model: this.config.model,
      messages: [
        { role: 'system', content: buildSegmentationSystemPrompt() },
        { role: 'user', content: buildSegmentationUserPrompt(brief) },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: AUDIENCE_PACK_SCHEMA_NAME,
          schema: audiencePackJsonSchema,
          strict: true,
        },
      },
      temperature: TEMPERATURE,
      max_completion_tokens: MAX_COMPLETION_TOKENS,
    };
  }

  private fail(
    context: GenerationContext,
    reason: GenerationFailureReason,
    message: string,
    err?: unknown,
  ): GenerationResult {
    this.config.logger.error(
      { chatId: context.chatId, reason, err: err ?? message },
      'Audience generation failed',
    );
    return { ok: false, reason, message };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function safeJsonParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}
