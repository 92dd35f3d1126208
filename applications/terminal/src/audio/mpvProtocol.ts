/**
 * mpv JSON IPC: how audio commands become mpv requests and how mpv's
 * messages become audio events.
 *
 * Requests and replies travel in order over one socket, so once the reply to
 * a request arrives every later property change was produced after mpv
 * applied it. Events are tagged with the sequence number of the last
 * acknowledged command for that reason.
 */

import { z } from 'zod';
import type { AudioCommand, AudioEvent } from '@riffline/shared';

export type MpvArgument = string | number | boolean;

export const TIME_POS_OBSERVER = 1;

export const OBSERVE_TIME_POS: MpvArgument[] = ['observe_property', TIME_POS_OBSERVER, 'time-pos'];

export function translateCommand(command: AudioCommand): MpvArgument[][] {
  switch (command.type) {
    case 'load':
      // Loaded paused; the Play that follows starts it
      return [
        ['set_property', 'pause', true],
        ['loadfile', command.path, 'replace'],
      ];
    case 'play':
    case 'resume':
      return [['set_property', 'pause', false]];
    case 'pause':
      return [['set_property', 'pause', true]];
    case 'stop':
      return [['stop']];
    case 'seek':
      return [['seek', command.position, 'absolute']];
    case 'setVolume':
      return [['set_property', 'volume', command.level]];
    case 'setMuted':
      return [['set_property', 'mute', command.muted]];
  }
}

export function encodeRequest(args: MpvArgument[], requestId: number): string {
  return `${JSON.stringify({ command: args, request_id: requestId })}\n`;
}

const replySchema = z.object({
  request_id: z.number(),
  error: z.string(),
});

const propertyChangeSchema = z.object({
  event: z.literal('property-change'),
  id: z.number().optional(),
  name: z.string(),
  data: z.unknown().optional(),
});

const endFileSchema = z.object({
  event: z.literal('end-file'),
  reason: z.string().optional(),
  file_error: z.string().optional(),
});

const otherEventSchema = z.object({ event: z.string() });

export type MpvMessage =
  | { kind: 'reply'; requestId: number; error: string }
  | { kind: 'timePos'; position: number }
  | { kind: 'endFile'; reason: string; fileError?: string }
  | { kind: 'other'; event: string };

/**
 * Parse one line from the IPC socket; null for blank or unreadable lines
 */
export function parseMpvLine(line: string): MpvMessage | null {
  const text = line.trim();
  if (!text) return null;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const reply = replySchema.safeParse(json);
  if (reply.success) {
    return { kind: 'reply', requestId: reply.data.request_id, error: reply.data.error };
  }

  const change = propertyChangeSchema.safeParse(json);
  if (change.success) {
    if (change.data.name === 'time-pos' && typeof change.data.data === 'number') {
      return { kind: 'timePos', position: change.data.data };
    }
    return { kind: 'other', event: 'property-change' };
  }

  const endFile = endFileSchema.safeParse(json);
  if (endFile.success) {
    return { kind: 'endFile', reason: endFile.data.reason ?? 'unknown', fileError: endFile.data.file_error };
  }

  const other = otherEventSchema.safeParse(json);
  return other.success ? { kind: 'other', event: other.data.event } : null;
}

/**
 * Audio event for an mpv message, tagged with `seq`. Replies and end-file
 * caused by our own stop or replace produce nothing.
 */
export function toAudioEvent(message: MpvMessage, seq: number): AudioEvent | null {
  switch (message.kind) {
    case 'timePos':
      return { type: 'position', seq, position: Math.max(0, message.position) };
    case 'endFile':
      if (message.reason === 'eof') {
        return { type: 'endOfTrack', seq };
      }
      if (message.reason === 'error') {
        return { type: 'error', seq, reason: message.fileError ?? 'playback error' };
      }
      return null;
    case 'reply':
    case 'other':
      return null;
  }
}
