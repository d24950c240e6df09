import { Injectable, Logger } from '@nestjs/common';
import { Dispatcher, request } from 'undici';
import { VideoCatalogConfig } from '@/shared/config/pipeline.config';
import {
  UploadSnippet,
  VideoDetails,
  VideoSummary,
} from '@/shared/youtube/interfaces/video.interface';
import { YoutubeApiError } from '@/shared/youtube/errors/youtube.errors';
import { formatDuration, parseIsoDuration } from '@/shared/youtube/utils/duration';
import { errorMessage, isRecord, UnknownRecord } from '@/shared/lib/util';

export const YOUTUBE_DATA_API_URL = 'https://www.googleapis.com/youtube/v3';

const PAGE_SIZE = 50;
const MAX_PLAYLIST_PAGES = 10;
const VIDEOS_BATCH_SIZE = 50;

function stringField(record: UnknownRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

function itemsOf(body: unknown): UnknownRecord[] {
  if (!isRecord(body) || !Array.isArray(body.items)) return [];
  return body.items.filter(isRecord);
}

function thumbnailOf(snippet: UnknownRecord): string {
  const thumbnails = snippet.thumbnails;
  if (!isRecord(thumbnails)) return '';
  for (const size of ['high', 'medium', 'default']) {
    const thumbnail = thumbnails[size];
    if (isRecord(thumbnail) && typeof thumbnail.url === 'string') {
      return thumbnail.url;
    }
  }
  return '';
}

function toUploadSnippet(item: UnknownRecord): UploadSnippet | null {
  const snippet = item.snippet;
  if (!isRecord(snippet) || !isRecord(snippet.resourceId)) return null;

  const contentId = stringField(snippet.resourceId, 'videoId');
  const publishedAt = stringField(snippet, 'publishedAt');
  if (!contentId || !publishedAt) return null;

  return {
    contentId,
    title: stringField(snippet, 'title'),
    description: stringField(snippet, 'description'),
    channelTitle: stringField(snippet, 'channelTitle'),
    publishedAt,
    thumbnailUrl: thumbnailOf(snippet),
  };
}

function toVideoDetails(item: UnknownRecord): VideoDetails {
  const duration = isRecord(item.contentDetails)
    ? stringField(item.contentDetails, 'duration')
    : '';
  const views = isRecord(item.statistics) ? Number(item.statistics.viewCount) : 0;

  return {
    durationSeconds: parseIsoDuration(duration),
    viewCount: Number.isFinite(views) ? views : 0,
  };
}

export function watchUrl(contentId: string): string {
  return `https://www.youtube.com/watch?v=${contentId}`;
}

/**
 * Recent uploads per channel through the YouTube Data API v3.
 */
@Injectable()
export class VideoCatalogService {
  private readonly logger = new Logger(VideoCatalogService.name);

  constructor(
    private readonly config: VideoCatalogConfig,
    private readonly dispatcher?: Dispatcher,
    private readonly baseUrl: string = YOUTUBE_DATA_API_URL,
  ) {}

  /**
   * Uploads published after `since` across `channelIds`, Shorts removed.
   * A channel that fails is logged and skipped; the others still count.
   */
  async getRecentVideos(
    channelIds: string[],
    since: Date,
  ): Promise<VideoSummary[]> {
    const uploads = new Map<string, UploadSnippet>();

    for (const channelId of new Set(channelIds)) {
      try {
        const playlistId = await this.uploadsPlaylistFor(channelId);
        if (!playlistId) {
          this.logger.warn(`Channel not found: ${channelId}`);
          continue;
        }
        const recent = await this.recentUploads(playlistId, since);
        this.logger.debug(`Channel ${channelId}: ${recent.length} recent uploads`);
        for (const upload of recent) {
          if (!uploads.has(upload.contentId)) {
            uploads.set(upload.contentId, upload);
          }
        }
      } catch (error) {
        this.logger.error(
          `Error fetching videos for channel ${channelId}: ${errorMessage(error)}`,
        );
      }
    }

    if (uploads.size === 0) return [];

    const details = await this.videoDetails([...uploads.keys()]);
    const videos: VideoSummary[] = [];

    for (const upload of uploads.values()) {
      const detail = details.get(upload.contentId);
      if (!detail) continue;

      if (detail.durationSeconds < this.config.minDurationSeconds) {
        this.logger.debug(
          `Skipping ${upload.contentId} (${detail.durationSeconds}s, likely a Short)`,
        );
        continue;
      }

      videos.push({
        ...upload,
        url: watchUrl(upload.contentId),
        durationSeconds: detail.durationSeconds,
        duration: formatDuration(detail.durationSeconds),
        viewCount: detail.viewCount,
      });
    }

    this.logger.log(
      `Found ${videos.length} recent videos across ${channelIds.length} channels`,
    );
    return videos;
  }

  private async uploadsPlaylistFor(channelId: string): Promise<string | null> {
    const body = await this.get('channels', {
      part: 'contentDetails',
      id: channelId,
    });
    const [channel] = itemsOf(body);
    if (!channel || !isRecord(channel.contentDetails)) return null;

    const playlists = channel.contentDetails.relatedPlaylists;
    if (!isRecord(playlists)) return null;
    return stringField(playlists, 'uploads') || null;
  }

  /**
   * Uploads playlists are newest first, so paging stops at the first item
   * older than `since`.
   */
  private async recentUploads(
    playlistId: string,
    since: Date,
  ): Promise<UploadSnippet[]> {
    const recent: UploadSnippet[] = [];
    let pageToken: string | undefined;

    for (let page = 0; page < MAX_PLAYLIST_PAGES; page++) {
      const body = await this.get('playlistItems', {
        part: 'snippet',
        playlistId,
        maxResults: String(PAGE_SIZE),
        ...(pageToken ? { pageToken } : {}),
      });

      for (const item of itemsOf(body)) {
        const upload = toUploadSnippet(item);
        if (!upload) continue;
        if (Date.parse(upload.publishedAt) <= since.getTime()) return recent;
        recent.push(upload);
      }

      const next = isRecord(body) ? body.nextPageToken : undefined;
      if (typeof next !== 'string' || !next) break;
      pageToken = next;
    }

    return recent;
  }

  private async videoDetails(
    contentIds: string[],
  ): Promise<Map<string, VideoDetails>> {
    const details = new Map<string, VideoDetails>();

    for (let i = 0; i < contentIds.length; i += VIDEOS_BATCH_SIZE) {
      const batch = contentIds.slice(i, i + VIDEOS_BATCH_SIZE);
      const body = await this.get('videos', {
        part: 'contentDetails,statistics',
        id: batch.join(','),
      });

      for (const item of itemsOf(body)) {
        const id = stringField(item, 'id');
        if (id) details.set(id, toVideoDetails(item));
      }
    }

    return details;
  }

  private async get(
    endpoint: string,
    params: Record<string, string>,
  ): Promise<unknown> {
    const query = new URLSearchParams({ ...params, key: this.config.apiKey });
    const response = await request(`${this.baseUrl}/${endpoint}?${query}`, {
      method: 'GET',
      dispatcher: this.dispatcher,
      headersTimeout: this.config.timeoutMs,
      bodyTimeout: this.config.timeoutMs,
    });

    if (response.statusCode >= 400) {
      const detail = await response.body.text();
      throw new YoutubeApiError(endpoint, response.statusCode, detail.slice(0, 200));
    }
    return response.body.json();
  }
}
