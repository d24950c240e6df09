export class YoutubeApiError extends Error {
  constructor(
    readonly endpoint: string,
    readonly statusCode: number,
    detail?: string,
  ) {
    super(
      `YouTube Data API ${endpoint} failed with HTTP ${statusCode}${detail ? `: ${detail}` : ''}`,
    );
    this.name = 'YoutubeApiError';
  }
}
