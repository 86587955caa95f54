import type { ArchiveStatsRecord, VideoSummaryRecord } from '@chatvault/core';
import type { ChannelInfo, VideoCandidate, VideoProgressEvent } from '@chatvault/shared';
import type { ImportReplaySummary, SyncReport, VideoOutcome } from '@chatvault/sync';
import type { ChalkInstance } from 'chalk';

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}

function padRight(text: string, width: number): string {
  const visibleLength = text.replace(ANSI_PATTERN, '').length;
  return text + ' '.repeat(Math.max(0, width - visibleLength));
}

/** `20240101` → `2024-01-01`; anything else renders as a dash. */
export function formatUploadDate(uploadDate: string | undefined): string {
  if (!uploadDate || !/^\d{8}$/.test(uploadDate)) {
    return '-';
  }
  return `${uploadDate.slice(0, 4)}-${uploadDate.slice(4, 6)}-${uploadDate.slice(6, 8)}`;
}

function colorState(state: VideoOutcome['state'], colors: ChalkInstance): string {
  switch (state) {
    case 'PERSISTED':
      return colors.green(state);
    case 'SKIPPED':
      return colors.dim(state);
    default:
      return colors.red(state);
  }
}

export function formatProgressLine(event: VideoProgressEvent, colors: ChalkInstance): string {
  const position = colors.dim(`[${String(event.index + 1)}/${String(event.total)}]`);
  const messages = event.state === 'PERSISTED' ? ` (${String(event.messageCount)} messages)` : '';
  return `${position} ${event.videoId} ${colorState(event.state, colors)}${messages}`;
}

export function formatSyncReport(report: SyncReport, colors: ChalkInstance): string[] {
  const lines = [
    colors.bold(`Sync summary for ${report.channelReference}`),
    `${colors.dim('Discovered:')} ${String(report.discovered)}`,
    `${colors.dim('After filters:')} ${String(report.filtered)}`,
    `${colors.dim('Processed:')} ${String(report.processed)}`,
    `${colors.dim('Successful:')} ${colors.green(String(report.successful))}`,
    `${colors.dim('Failed:')} ${report.failed > 0 ? colors.red(String(report.failed)) : '0'}`,
    `${colors.dim('Skipped:')} ${String(report.skipped)}`,
  ];

  if (report.exhausted) {
    lines.push(colors.yellow('No videos found for this channel.'));
  }
  if (report.halted) {
    lines.push(colors.dim('Stopped at the first video that was already synchronized.'));
  }

  const failures = report.outcomes.filter((outcome) => outcome.error !== null && outcome.state !== 'SKIPPED');
  for (const outcome of failures) {
    lines.push(colors.red(`  ${outcome.videoId}: ${outcome.error?.message ?? ''}`));
  }
  for (const outcome of report.outcomes.filter((item) => item.databaseError !== null)) {
    lines.push(colors.yellow(`  ${outcome.videoId}: database: ${outcome.databaseError?.message ?? ''}`));
  }
  return lines;
}

export function formatChannelInfo(info: ChannelInfo | null, colors: ChalkInstance): string[] {
  if (info === null) {
    return [colors.yellow('Channel info unavailable.')];
  }
  return [
    `${colors.dim('Channel:')} ${info.name ?? '-'}`,
    `${colors.dim('Channel ID:')} ${info.channelId || '-'}`,
    `${colors.dim('URL:')} ${info.url}`,
    `${colors.dim('Subscribers:')} ${info.subscriberCount === null ? '-' : String(info.subscriberCount)}`,
  ];
}

export function formatCandidates(candidates: readonly VideoCandidate[], limit: number, colors: ChalkInstance): string[] {
  const lines = [colors.bold(`Found ${String(candidates.length)} livestream candidates`)];
  for (const [index, candidate] of candidates.slice(0, limit).entries()) {
    lines.push(`  ${String(index + 1)}. ${candidate.videoId}  ${truncate(candidate.title, 60)}`);
  }
  if (candidates.length > limit) {
    lines.push(colors.dim(`  ... and ${String(candidates.length - limit)} more`));
  }
  return lines;
}

export function formatImportSummary(summary: ImportReplaySummary, colors: ChalkInstance): string[] {
  return [
    colors.bold(`Imported ${summary.videoId}: ${summary.title}`),
    `${colors.dim('Messages in file:')} ${String(summary.totalMessages)}`,
    `${colors.dim('Inserted:')} ${String(summary.inserted)}`,
    `${colors.dim('Skipped (duplicates):')} ${String(summary.skipped)}`,
    `${colors.dim('Failed:')} ${String(summary.failed)}`,
  ];
}

export function formatVideoTable(videos: readonly VideoSummaryRecord[], colors: ChalkInstance): string[] {
  if (videos.length === 0) {
    return [colors.dim('No videos stored.')];
  }

  const header =
    padRight('VIDEO ID', 14) + padRight('UPLOADED', 12) + padRight('MESSAGES', 10) + padRight('STATUS', 10) + 'TITLE';
  const rows = videos.map(
    (video) =>
      padRight(video.videoId, 14) +
      padRight(formatUploadDate(video.uploadDate), 12) +
      padRight(String(video.messageCount), 10) +
      padRight(video.liveStatus, 10) +
      truncate(video.title, 50),
  );
  return [colors.bold(header), ...rows];
}

export function formatArchiveStats(stats: ArchiveStatsRecord, colors: ChalkInstance): string {
  return (
    `${colors.dim('Archive:')} ${String(stats.videoCount)} videos, ${String(stats.messageCount)} messages, ` +
    `${String(stats.authorCount)} authors, ${String(stats.superchatCount)} paid messages`
  );
}
