import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { GeminiService, SUMMARY_PLACEHOLDERS } from './gemini.service';

const mockGenerateContent = jest.fn();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({
    models: { generateContent: mockGenerateContent },
  })),
}));

const reply = (text: string) => ({
  candidates: [{ content: { parts: [{ text }] } }],
});

function createService(env: Record<string, string>): GeminiService {
  const service = new GeminiService(new ConfigService(env));
  service.onModuleInit();
  return service;
}

describe('GeminiService', () => {
  beforeEach(() => {
    mockGenerateContent.mockReset();
    jest.mocked(GoogleGenAI).mockClear();
  });

  describe('without an API key', () => {
    const service = createService({});

    it('keeps every video', async () => {
      await expect(
        service.isRelevant('Any title', 'Any description', 'generative AI'),
      ).resolves.toBe(true);
      expect(mockGenerateContent).not.toHaveBeenCalled();
    });

    it('returns the failure placeholder instead of a summary', async () => {
      await expect(service.summarize('some transcript')).resolves.toBe(
        SUMMARY_PLACEHOLDERS.failed,
      );
    });
  });

  describe('with an API key', () => {
    let service: GeminiService;

    beforeEach(() => {
      service = createService({
        GEMINI_API_KEY: 'test-key',
        GEMINI_MODEL: 'gemini-test',
      });
    });

    it('creates the client with the configured key', () => {
      expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: 'test-key' });
    });

    it('summarizes a transcript with the configured model', async () => {
      mockGenerateContent.mockResolvedValue(reply('  【要約】テスト  \n'));

      await expect(service.summarize('transcript text')).resolves.toBe(
        '【要約】テスト',
      );
      expect(mockGenerateContent).toHaveBeenCalledWith(
        expect.objectContaining({
          model: 'gemini-test',
          contents: 'transcript text',
        }),
      );
    });

    it('does not call the model for empty text', async () => {
      await expect(service.summarize('   ')).resolves.toBe(
        SUMMARY_PLACEHOLDERS.noText,
      );
      expect(mockGenerateContent).not.toHaveBeenCalled();
    });

    it('returns the failure placeholder when the model errors', async () => {
      mockGenerateContent.mockRejectedValue(new Error('quota exceeded'));

      await expect(service.summarize('transcript text')).resolves.toBe(
        SUMMARY_PLACEHOLDERS.failed,
      );
    });

    it('returns the failure placeholder for an empty response', async () => {
      mockGenerateContent.mockResolvedValue({ candidates: [] });

      await expect(service.summarize('transcript text')).resolves.toBe(
        SUMMARY_PLACEHOLDERS.failed,
      );
    });

    it('reads a YES/NO relevance answer', async () => {
      mockGenerateContent
        .mockResolvedValueOnce(reply('YES'))
        .mockResolvedValueOnce(reply('no.'));

      await expect(
        service.isRelevant('LLM agents in practice', 'desc', 'generative AI'),
      ).resolves.toBe(true);
      await expect(
        service.isRelevant('Cooking pasta', 'desc', 'generative AI'),
      ).resolves.toBe(false);
    });

    it('keeps a video when the relevance check fails', async () => {
      mockGenerateContent.mockRejectedValue(new Error('timeout'));

      await expect(
        service.isRelevant('Some title', 'desc', 'generative AI'),
      ).resolves.toBe(true);
    });
  });
});
