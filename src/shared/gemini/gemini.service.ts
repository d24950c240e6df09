import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { errorMessage, errorStack } from '@/shared/lib/util';

export const SUMMARY_PLACEHOLDERS = {
  noText: '要約するテキストがありませんでした。',
  failed: '要約の生成中にエラーが発生しました。',
  noTranscript: '字幕が取得できなかったため、要約を作成できませんでした。',
} as const;

const SUMMARY_INSTRUCTION = `あなたは優秀な要約アシスタントです。
提供されたYouTube動画の字幕テキストを元に、以下の構成で日本語のレポートを作成してください。

【要約】
動画の要点を600文字程度のパラグラフ形式（箇条書き不可）でまとめてください。

【考察】
動画の内容から読み取れる深い洞察や、視聴者が気づきにくい視点を提供してください。

【アクションプラン】
視聴者が明日から実践できる具体的な行動指針を3つ提案してください。`;

const DESCRIPTION_PROMPT_LIMIT = 500;

@Injectable()
export class GeminiService implements OnModuleInit {
  private readonly logger = new Logger(GeminiService.name);
  private client?: GoogleGenAI;
  private model = 'gemini-2.0-flash';

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const apiKey = this.configService.get<string>('GEMINI_API_KEY');
    this.model = this.configService.get<string>('GEMINI_MODEL', this.model);
    if (!apiKey) {
      this.logger.warn(
        'GEMINI_API_KEY is not configured; summaries are disabled and every video counts as relevant',
      );
      return;
    }
    this.client = new GoogleGenAI({ apiKey });
    this.logger.log(`Gemini client initialized with ${this.model}`);
  }

  /**
   * Japanese report (summary, insights, three action items) for a transcript.
   * Never throws: empty input and model failures come back as a placeholder.
   */
  async summarize(transcript: string): Promise<string> {
    if (!transcript.trim()) {
      this.logger.warn('No text provided for summarization');
      return SUMMARY_PLACEHOLDERS.noText;
    }

    try {
      const summary = await this.generateText(transcript, {
        systemInstruction: SUMMARY_INSTRUCTION,
        temperature: 0.7,
        maxOutputTokens: 1000,
      });
      return summary.trim();
    } catch (error) {
      this.logger.error(
        `Error during summarization: ${errorMessage(error)}`,
        errorStack(error),
      );
      return SUMMARY_PLACEHOLDERS.failed;
    }
  }

  /**
   * Topic filter. Without a client, or when the model call fails, the video
   * is kept.
   */
  async isRelevant(
    title: string,
    description: string,
    topic: string,
  ): Promise<boolean> {
    if (!this.client) return true;

    const prompt = [
      `Is the following YouTube video about "${topic}"?`,
      'Answer with exactly one word: YES or NO.',
      '',
      `Title: ${title}`,
      `Description: ${description.slice(0, DESCRIPTION_PROMPT_LIMIT)}`,
    ].join('\n');

    try {
      const answer = await this.generateText(prompt, { temperature: 0 });
      const relevant = answer.trim().toUpperCase().startsWith('YES');
      this.logger.debug(`Relevance of "${title}": ${relevant ? 'YES' : 'NO'}`);
      return relevant;
    } catch (error) {
      this.logger.warn(
        `Relevance check failed for "${title}", keeping it: ${errorMessage(error)}`,
      );
      return true;
    }
  }

  private async generateText(
    contents: string,
    config: {
      systemInstruction?: string;
      temperature?: number;
      maxOutputTokens?: number;
    },
  ): Promise<string> {
    if (!this.client) {
      throw new Error(
        'Gemini client is not initialized. Check GEMINI_API_KEY configuration.',
      );
    }

    const result = await this.client.models.generateContent({
      model: this.model,
      contents,
      config,
    });

    const text = result.candidates?.[0]?.content?.parts?.[0]?.text;
    if (!text) {
      throw new Error('No text returned from Gemini API');
    }
    return text;
  }
}
