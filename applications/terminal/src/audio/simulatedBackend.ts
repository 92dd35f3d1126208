/**
 * Audio backend without audio: a virtual clock that advances on its own
 * timer and reports position and end of track like a real player would.
 * Used with `--backend simulated` and in tests.
 */

import {
  MessageQueue,
  createLogger,
  type AudioBackend,
  type AudioCommand,
  type AudioEvent,
} from '@riffline/shared';

const log = createLogger('SimulatedBackend');

export interface SimulatedBackendOptions {
  intervalMs?: number;
  /** Reason to fail loading `path`, or null to play it */
  failLoad?: (path: string) => string | null;
}

export class SimulatedAudioBackend implements AudioBackend {
  private readonly events = new MessageQueue<AudioEvent>();
  private readonly intervalMs: number;
  private readonly failLoad: (path: string) => string | null;
  private readonly timer: ReturnType<typeof setInterval>;

  private path: string | null = null;
  private duration = 0;
  private elapsedMs = 0;
  private playing = false;
  // Latest command seen; every report is tagged with it
  private seq = 0;

  volume = 100;
  muted = false;

  constructor(options: SimulatedBackendOptions = {}) {
    this.intervalMs = options.intervalMs ?? 250;
    this.failLoad = options.failLoad ?? (() => null);
    this.timer = setInterval(() => this.advance(), this.intervalMs);
    this.timer.unref();
  }

  send(command: AudioCommand): void {
    this.seq = command.seq;

    switch (command.type) {
      case 'load': {
        const failure = this.failLoad(command.path);
        if (failure) {
          this.reset();
          this.events.post({ type: 'error', seq: command.seq, reason: failure });
          return;
        }
        this.path = command.path;
        this.duration = command.duration;
        this.elapsedMs = 0;
        this.playing = false;
        return;
      }
      case 'play':
      case 'resume':
        this.playing = this.path !== null;
        return;
      case 'pause':
        this.playing = false;
        return;
      case 'stop':
        this.reset();
        return;
      case 'seek':
        if (this.path === null) return;
        this.elapsedMs = Math.max(0, Math.round(command.position * 1000));
        this.events.post({ type: 'position', seq: command.seq, position: this.elapsedMs / 1000 });
        return;
      case 'setVolume':
        this.volume = command.level;
        return;
      case 'setMuted':
        this.muted = command.muted;
        return;
    }
  }

  drain(): AudioEvent[] {
    return this.events.drain();
  }

  get currentPath(): string | null {
    return this.path;
  }

  get isPlaying(): boolean {
    return this.playing;
  }

  async dispose(): Promise<void> {
    clearInterval(this.timer);
    this.events.close();
    log.debug('Disposed');
  }

  private advance(): void {
    if (!this.playing || this.path === null) return;

    this.elapsedMs += this.intervalMs;
    const position = this.elapsedMs / 1000;

    if (this.duration > 0 && position >= this.duration) {
      this.events.post({ type: 'position', seq: this.seq, position: this.duration });
      this.events.post({ type: 'endOfTrack', seq: this.seq });
      this.playing = false;
      return;
    }
    this.events.post({ type: 'position', seq: this.seq, position });
  }

  private reset(): void {
    this.path = null;
    this.duration = 0;
    this.elapsedMs = 0;
    this.playing = false;
  }
}
