import { describe, expect, it, vi } from 'vitest';
import { loadEnv } from '../src/config/env';
import { audiencePackJsonSchema } from '../src/segmentation/schema';
import {
  SegmentationClient,
  type ChatCompletionPayload,
  type CreateChatCompletion,
} from '../src/services/segmentation-client';
import { createSilentLogger, makeAudience, makeAudiencePack, sampleBrief } from './fixtures';

function completionWith(content: string | null, refusal: string | null = null): ChatCompletionPayload {
  return { choices: [{ message: { content, refusal } }] };
}

function createClient(response: ChatCompletionPayload | Error, model = 'gpt-4.1') {
  const createCompletion = vi.fn<CreateChatCompletion>();
  if (response instanceof Error) {
    createCompletion.mockRejectedValue(response);
  } else {
    createCompletion.mockResolvedValue(response);
  }
  const logger = createSilentLogger();
  const client = new SegmentationClient({ createCompletion, model, logger });
  return { client, createCompletion, logger };
}

describe('SegmentationClient', () => {
  it('sends both prompts with the schema as a strict response format', async () => {
    const { client, createCompletion } = createClient(
      completionWith(JSON.stringify({ audiences: makeAudiencePack() })),
    );

    await client.generateAudiences(sampleBrief, { chatId: 42 });

    expect(createCompletion).toHaveBeenCalledTimes(1);
    const params = createCompletion.mock.calls[0][0];
    expect(params.model).toBe('gpt-4.1');
    expect(params.temperature).toBe(0.6);
    expect(params.max_completion_tokens).toBe(1800);
    expect(params.response_format).toEqual({
      type: 'json_schema',
      json_schema: { name: 'audience_pack', schema: audiencePackJsonSchema, strict: true },
    });
    expect(params.messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(params.messages[0].content).toContain('РОВНО 5 микро-ЦА');
    expect(params.messages[1].content).toBe(
      'Город: Казань\n' +
        'Жилой комплекс: ЖК Лесной\n' +
        'Описание проекта: Бизнес-класс у парка, подземный паркинг\n' +
        'Год сдачи: 2027\n' +
        '\n' +
        'Верни строго JSON по схеме audience_pack.',
    );
  });

  it('pairs the default model with the fixed sampling settings', async () => {
    const { openaiModel } = loadEnv({ TELEGRAM_BOT_TOKEN: 'test-token', OPENAI_API_KEY: 'test-key' });
    const { client, createCompletion } = createClient(
      completionWith(JSON.stringify({ audiences: makeAudiencePack() })),
      openaiModel,
    );

    await client.generateAudiences(sampleBrief);

    const params = createCompletion.mock.calls[0][0];
    expect(params).toMatchObject({
      model: 'gpt-4.1',
      temperature: 0.6,
      max_completion_tokens: 1800,
    });
    expect(params).not.toHaveProperty('max_tokens');
  });

  it('returns the five records in order', async () => {
    const pack = makeAudiencePack();
    const { client } = createClient(completionWith(JSON.stringify({ audiences: pack })));

    const result = await client.generateAudiences(sampleBrief);

    expect(result).toEqual({ ok: true, audiences: pack });
  });

  it.each([
    ['four records', { audiences: makeAudiencePack().slice(0, 4) }],
    ['six records', { audiences: [...makeAudiencePack(), makeAudience(6)] }],
    [
      'a record without a trigger',
      {
        audiences: makeAudiencePack().map((audience, i) => {
          if (i !== 2) return audience;
          const { trigger: _trigger, ...rest } = audience;
          return rest;
        }),
      },
    ],
    [
      'a record with an extra field',
      {
        audiences: makeAudiencePack().map((audience) => ({ ...audience, budget: 'high' })),
      },
    ],
    [
      'too few subtasks',
      {
        audiences: makeAudiencePack().map((audience) => ({
          ...audience,
          critical_subtasks: ['one', 'two'],
        })),
      },
    ],
    ['a missing audiences key', { segments: makeAudiencePack() }],
  ])('treats %s as a schema mismatch', async (_label, payload) => {
    const { client, logger } = createClient(completionWith(JSON.stringify(payload)));

    const result = await client.generateAudiences(sampleBrief, { chatId: 42 });

    expect(result.ok).toBe(false);
    expect(result.ok === false && result.reason).toBe('schema_mismatch');
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('reports malformed JSON', async () => {
    const { client } = createClient(completionWith('{"audiences": ['));

    const result = await client.generateAudiences(sampleBrief);

    expect(result).toEqual({
      ok: false,
      reason: 'invalid_json',
      message: 'Unparseable content: {"audiences": [',
    });
  });

  it('reports empty content and refusals', async () => {
    const empty = createClient(completionWith(null));
    const refused = createClient(completionWith(null, 'I cannot help with that.'));

    expect(await empty.client.generateAudiences(sampleBrief)).toEqual({
      ok: false,
      reason: 'empty_response',
      message: 'Completion has no content',
    });
    expect(await refused.client.generateAudiences(sampleBrief)).toEqual({
      ok: false,
      reason: 'empty_response',
      message: 'I cannot help with that.',
    });
  });

  it('reports a request error after a single attempt', async () => {
    const error = new Error('Request timed out.');
    const { client, createCompletion, logger } = createClient(error);

    const result = await client.generateAudiences(sampleBrief, { chatId: 7 });

    expect(result).toEqual({ ok: false, reason: 'request_failed', message: 'Request timed out.' });
    expect(createCompletion).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      { chatId: 7, reason: 'request_failed', err: error },
      'Audience generation failed',
    );
  });
});
