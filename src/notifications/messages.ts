/**
 * messages.ts
 * Human-readable text for notifications
 */

import { truncate } from '../utils/error-helpers.js';

import type { NotificationArgs } from './notification-port.js';

// Leaves room for the "**Part i/n:**" header on split messages
const PART_HEADER_RESERVE = 100;
const PAYLOAD_PREVIEW_LENGTH = 150;
const ERROR_PREVIEW_LENGTH = 500;

/**
 * Advisory wait text: "~45 seconds", "~3 minutes", "~1h 15m", "~2 hours"
 */
export function formatWaitTime(ms: number): string {
  const seconds = Math.max(0, Math.round(ms / 1000));

  if (seconds < 60) {
    return `~${seconds} seconds`;
  }
  if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    return `~${minutes} minute${minutes !== 1 ? 's' : ''}`;
  }

  const hours = Math.floor(seconds / 3600);
  const remainingMinutes = Math.floor((seconds % 3600) / 60);
  if (remainingMinutes > 0) {
    return `~${hours}h ${remainingMinutes}m`;
  }
  return `~${hours} hour${hours !== 1 ? 's' : ''}`;
}

/**
 * Content up to `maxLength` goes out whole; longer content is cut into labelled
 * parts of `maxLength - 100` characters
 */
export function splitMessage(content: string, maxLength: number): string[] {
  if (content.length <= maxLength) {
    return [content];
  }

  const chunkSize = Math.max(1, maxLength - PART_HEADER_RESERVE);
  const chunks: string[] = [];
  for (let i = 0; i < content.length; i += chunkSize) {
    chunks.push(content.slice(i, i + chunkSize));
  }
  return chunks.map((chunk, i) => `**Part ${i + 1}/${chunks.length}:**\n${chunk}`);
}

export function previewPayload(payload: string): string {
  return truncate(payload, PAYLOAD_PREVIEW_LENGTH);
}

export function renderMessages(
  maxLength: number,
  ...[kind, payload]: NotificationArgs
): string[] {
  switch (kind) {
    case 'queued':
      return [
        `📝 Query queued at position **#${payload.position}** (${formatWaitTime(payload.estimatedWaitMs)})`,
      ];
    case 'starting':
      return ['🔄 Processing query...'];
    case 'completed':
      return splitMessage(payload.result || 'No content available', maxLength);
    case 'failed':
      return [
        [
          `❌ Processing failed for query \`${payload.itemId}\``,
          `*${payload.payloadPreview}*`,
          `Error: ${truncate(payload.errorDetail, ERROR_PREVIEW_LENGTH)}`,
          'Please try rephrasing your question or try again later.',
        ].join('\n'),
      ];
  }
}
