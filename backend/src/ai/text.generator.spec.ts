import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { BackendUnavailableError } from '../common/errors/parking.errors';
import { OpenAiTextGenerator } from './text.generator';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } },
  })),
}));

function completion(content: string | null) {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

describe('OpenAiTextGenerator', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    jest.mocked(OpenAI).mockClear();
  });

  it('is unavailable without an API key and never builds a client', async () => {
    const generator = new OpenAiTextGenerator(new ConfigService({}));

    expect(generator.available).toBe(false);
    expect(OpenAI).not.toHaveBeenCalled();
    await expect(generator.generate('hi')).rejects.toThrow(
      new BackendUnavailableError('Generative backend is not configured'),
    );
  });

  it('sends the prompt to the configured model', async () => {
    mockCreate.mockResolvedValue(completion('  There are 3 visitors parked.  '));
    const generator = new OpenAiTextGenerator(
      new ConfigService({ OPENAI_API_KEY: 'test-secret', OPENAI_RESPONSE_MODEL: 'test-model' }),
    );

    await expect(generator.generate('prompt text')).resolves.toBe('There are 3 visitors parked.');

    expect(generator.available).toBe(true);
    expect(OpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [{ role: 'user', content: 'prompt text' }],
      temperature: 0.3,
    });
  });

  it('defaults the model', async () => {
    mockCreate.mockResolvedValue(completion('ok'));
    const generator = new OpenAiTextGenerator(new ConfigService({ OPENAI_API_KEY: 'test-secret' }));

    await generator.generate('prompt text');

    expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'gpt-4o-mini' }));
  });

  it('wraps request failures', async () => {
    const failure = new Error('429 rate limited');
    mockCreate.mockRejectedValue(failure);
    const generator = new OpenAiTextGenerator(new ConfigService({ OPENAI_API_KEY: 'test-secret' }));

    const attempt = generator.generate('prompt text');

    await expect(attempt).rejects.toThrow(
      new BackendUnavailableError('Generative backend request failed'),
    );
    await expect(attempt).rejects.toMatchObject({ origin: failure });
  });

  it.each([[null], ['']])('treats %p output as a failure', async (content) => {
    mockCreate.mockResolvedValue(completion(content));
    const generator = new OpenAiTextGenerator(new ConfigService({ OPENAI_API_KEY: 'test-secret' }));

    await expect(generator.generate('prompt text')).rejects.toThrow(
      new BackendUnavailableError('No output from OpenAI'),
    );
  });
});
