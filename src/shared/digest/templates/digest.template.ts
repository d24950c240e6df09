import { DIGEST_TIME_ZONE } from '@/shared/digest/digest.constants';
import {
  DigestItem,
  RenderedDigest,
} from '@/shared/digest/interfaces/digest.interface';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * `YYYY.MM.DD` in the digest's time zone.
 */
export function formatDate(date: Date, timeZone = DIGEST_TIME_ZONE): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);
  const part = (type: string) =>
    parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}.${part('month')}.${part('day')}`;
}

export function formatViewCount(views: number): string {
  if (views >= 1_000_000) return `${(views / 1_000_000).toFixed(1)}M views`;
  if (views >= 1_000) return `${(views / 1_000).toFixed(1)}K views`;
  return `${views} views`;
}

function publishedLabel(publishedAt: string): string {
  const date = new Date(publishedAt);
  return Number.isNaN(date.getTime()) ? publishedAt : formatDate(date);
}

function renderText(items: DigestItem[]): string {
  let text = '直近の更新動画要約です。\n\n';
  for (const { video, summary } of items) {
    text += `■ ${video.title}\n`;
    text += `URL: ${video.url}\n`;
    text += `要約:\n${summary}\n`;
    text += `${'-'.repeat(30)}\n\n`;
  }
  return text;
}

function renderCard({ video, summary }: DigestItem): string {
  const url = escapeHtml(video.url);
  const title = escapeHtml(video.title);
  const meta = [
    escapeHtml(video.channelTitle),
    formatViewCount(video.viewCount),
    escapeHtml(publishedLabel(video.publishedAt)),
  ].join(' • ');
  const body = escapeHtml(summary).replace(/\r?\n/g, '<br>');

  return `
      <div class="card" style="margin-bottom: 32px; border-bottom: 1px solid #f0f0f0; padding-bottom: 24px;">
        <a href="${url}" style="display: block; position: relative;">
          <img src="${escapeHtml(video.thumbnailUrl)}" alt="${title}" style="width: 100%; border-radius: 12px; display: block;">
          <span style="position: absolute; bottom: 8px; right: 8px; background-color: rgba(0, 0, 0, 0.8); color: #ffffff; padding: 3px 6px; border-radius: 4px; font-size: 12px;">${escapeHtml(video.duration)}</span>
        </a>
        <a href="${url}" style="display: block; font-size: 18px; font-weight: 600; color: #0f0f0f; text-decoration: none; margin: 12px 0;">${title}</a>
        <div style="font-size: 12px; color: #606060; margin-bottom: 16px;">${meta}</div>
        <div style="background-color: #f2f2f2; padding: 16px; border-radius: 12px; font-size: 14px; line-height: 1.6;">${body}</div>
      </div>`;
}

function renderHtml(items: DigestItem[], date: Date): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>YouTube Summary</title>
  </head>
  <body style="font-family: 'Roboto', Helvetica, Arial, sans-serif; background-color: #f9f9f9; margin: 0; padding: 20px; color: #0f0f0f;">
    <div style="max-width: 600px; margin: 0 auto; background-color: #ffffff; border-radius: 16px; overflow: hidden;">
      <div style="padding: 16px 24px; border-bottom: 1px solid #f0f0f0;">
        <span style="font-size: 22px; font-weight: 700;">YouTube Summary</span>
        <span style="float: right; font-size: 12px; color: #606060;">${formatDate(date)}</span>
      </div>
      <div style="padding: 24px;">${items.map(renderCard).join('')}
      </div>
      <div style="text-align: center; padding: 32px; color: #909090; font-size: 12px;">
        &copy; ${formatDate(date).slice(0, 4)} YouTube Summary Agent
      </div>
    </div>
  </body>
</html>
`;
}

export function renderDigest(items: DigestItem[], date: Date): RenderedDigest {
  return {
    subject: `【YouTube要約】${items.length}本の新着動画があります`,
    text: renderText(items),
    html: renderHtml(items, date),
  };
}

export function renderEmptyDigest(): RenderedDigest {
  return {
    subject: '【YouTube要約】新着動画はありませんでした',
    text: '直近の更新はありませんでした。',
    html: '<html><body><p>直近の更新はありませんでした。</p></body></html>',
  };
}
