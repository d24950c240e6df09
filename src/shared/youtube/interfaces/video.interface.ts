export interface VideoSummary {
  contentId: string;
  title: string;
  description: string;
  channelTitle: string;
  /** RFC 3339 timestamp as returned by the Data API */
  publishedAt: string;
  url: string;
  durationSeconds: number;
  /** `1:02:10` or `5:30` */
  duration: string;
  viewCount: number;
  thumbnailUrl: string;
}

/**
 * A playlist upload before its duration and statistics are known.
 */
export interface UploadSnippet {
  contentId: string;
  title: string;
  description: string;
  channelTitle: string;
  publishedAt: string;
  thumbnailUrl: string;
}

export interface VideoDetails {
  durationSeconds: number;
  viewCount: number;
}
