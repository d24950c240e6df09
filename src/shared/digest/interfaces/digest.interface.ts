import { VideoSummary } from '@/shared/youtube/interfaces/video.interface';

export interface DigestItem {
  video: VideoSummary;
  summary: string;
  hasTranscript: boolean;
}

export interface RenderedDigest {
  subject: string;
  text: string;
  html: string;
}

export interface DigestRunReport {
  startedAt: Date;
  finishedAt: Date;
  channels: number;
  /** Uploads returned by the catalog */
  discovered: number;
  alreadyProcessed: number;
  offTopic: number;
  /** Videos that went through transcript + summary */
  processed: number;
  transcriptsFound: number;
  emailSent: boolean;
  errors: string[];
}
