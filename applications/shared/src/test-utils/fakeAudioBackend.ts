import type { AudioBackend, AudioCommand, AudioEvent } from '../audio/backend';
import { createTrack } from '../catalog/catalog';
import { MessageQueue } from '../lib/channel';
import type { Track } from '../types';

/**
 * In-process backend for tests: records every command and hands back
 * whatever events the test queues with `emit`.
 */
export class FakeAudioBackend implements AudioBackend {
  readonly commands: AudioCommand[] = [];
  private readonly events = new MessageQueue<AudioEvent>();

  send(command: AudioCommand): void {
    this.commands.push(command);
  }

  drain(): AudioEvent[] {
    return this.events.drain();
  }

  emit(event: AudioEvent): void {
    this.events.post(event);
  }

  get lastSeq(): number {
    return this.commands.length === 0 ? 0 : this.commands[this.commands.length - 1].seq;
  }

  get lastCommand(): AudioCommand | undefined {
    return this.commands[this.commands.length - 1];
  }

  commandTypes(): string[] {
    return this.commands.map((c) => c.type);
  }

  async dispose(): Promise<void> {
    this.events.close();
  }
}

export function makeTrack(title: string, overrides: Partial<Omit<Track, 'id'>> = {}): Track {
  return createTrack({
    path: overrides.path ?? `/music/${title}.mp3`,
    title,
    artist: overrides.artist ?? 'Test Artist',
    album: overrides.album ?? 'Test Album',
    duration: overrides.duration ?? 180,
  });
}
