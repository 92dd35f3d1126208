/**
 * Transport state machine - owns the single active track and its playback
 * phase, position, volume and play-order modes.
 *
 * Every command sent to the audio backend is tagged with a fresh sequence
 * number. Position reports are only trusted when they carry the latest number,
 * which keeps the progress bar from jumping back after a seek or a volume
 * change. End-of-track and error reports belong to the current track as long
 * as they were produced after its load, since the backend sends them once.
 */

import type { AudioBackend, AudioCommandBody, AudioEvent } from '../audio/backend';
import { createLogger } from '../lib/logger';
import { clamp } from '../lib/utils';
import { PlaybackPhase, RepeatMode, type Track, type TransportState } from '../types';
import { ShuffleOrder } from './shuffle';

const log = createLogger('Transport');

export type TransportEvent =
  | { type: 'trackChange'; track: Track }
  | { type: 'pause'; track: Track }
  | { type: 'resume'; track: Track }
  | { type: 'stop' }
  | { type: 'error'; track: Track | null; reason: string };

export type TransportListener = (event: TransportEvent) => void;

export interface TransportOptions {
  backend: AudioBackend;
  volume?: number;
  muted?: boolean;
  shuffle?: boolean;
  repeat?: RepeatMode;
  shuffleSeed?: number;
  /** Id of the selected track, used as the base for next/previous when the playing track is not in view */
  anchor?: () => string | null;
}

const REPEAT_CYCLE: Record<RepeatMode, RepeatMode> = {
  [RepeatMode.Off]: RepeatMode.RepeatAll,
  [RepeatMode.RepeatAll]: RepeatMode.RepeatOne,
  [RepeatMode.RepeatOne]: RepeatMode.Off,
};

export class Transport {
  private readonly backend: AudioBackend;
  private readonly anchor: () => string | null;
  private readonly listeners = new Set<TransportListener>();
  private readonly shuffleOrder: ShuffleOrder;

  private currentTrack: Track | null = null;
  private phase: PlaybackPhase = PlaybackPhase.Stopped;
  private position = 0;
  private volume: number;
  private muted: boolean;
  private shuffle: boolean;
  private repeat: RepeatMode;

  private seq = 0;
  // Sequence number of the Load that started the current track
  private loadSeq = 0;
  private queue: readonly Track[] = [];

  constructor(options: TransportOptions) {
    this.backend = options.backend;
    this.anchor = options.anchor ?? (() => null);
    this.volume = clamp(Math.round(options.volume ?? 80), 0, 100);
    this.muted = options.muted ?? false;
    this.shuffle = options.shuffle ?? false;
    this.repeat = options.repeat ?? RepeatMode.Off;
    this.shuffleOrder = new ShuffleOrder(options.shuffleSeed ?? Date.now());
  }

  // ===== State =====

  getState(): TransportState {
    return {
      currentTrackId: this.currentTrack?.id ?? null,
      phase: this.phase,
      position: this.position,
      volume: this.volume,
      muted: this.muted,
      shuffle: this.shuffle,
      repeat: this.repeat,
      seq: this.seq,
    };
  }

  getCurrentTrack(): Track | null {
    return this.currentTrack;
  }

  getShuffleOrder(): readonly string[] {
    return this.shuffleOrder.ids;
  }

  /**
   * Replace the play order with the current view. The shuffle permutation is
   * regenerated from it, keeping the playing track at its head.
   */
  setQueue(tracks: readonly Track[]): void {
    this.queue = tracks;
    this.shuffleOrder.reset(
      tracks.map((t) => t.id),
      this.currentTrack?.id ?? null
    );
  }

  // ===== Playback control =====

  /**
   * Start `track` from the beginning. Under shuffle a hand-picked track opens
   * a new shuffle cycle so the rest of the view still plays exactly once.
   */
  load(track: Track): void {
    if (this.shuffle) {
      this.shuffleOrder.reset(
        this.queue.map((t) => t.id),
        track.id
      );
    }
    this.start(track);
  }

  pause(): boolean {
    if (this.phase !== PlaybackPhase.Playing || !this.currentTrack) {
      log.debug('Ignoring pause: nothing is playing');
      return false;
    }
    this.phase = PlaybackPhase.Paused;
    this.issue({ type: 'pause' });
    this.emit({ type: 'pause', track: this.currentTrack });
    return true;
  }

  resume(): boolean {
    if (this.phase !== PlaybackPhase.Paused || !this.currentTrack) {
      log.debug('Ignoring resume: playback is not paused');
      return false;
    }
    this.phase = PlaybackPhase.Playing;
    this.issue({ type: 'resume' });
    this.emit({ type: 'resume', track: this.currentTrack });
    return true;
  }

  togglePause(): boolean {
    return this.phase === PlaybackPhase.Paused ? this.resume() : this.pause();
  }

  stop(): boolean {
    if (this.phase === PlaybackPhase.Stopped) {
      log.debug('Ignoring stop: already stopped');
      return false;
    }
    this.issue({ type: 'stop' });
    this.clearTrack();
    this.emit({ type: 'stop' });
    return true;
  }

  /**
   * Move the position by `delta` seconds. Seeking to or past the end resolves
   * like a natural end of track.
   */
  seek(delta: number): boolean {
    return this.seekTo(this.position + delta);
  }

  seekTo(target: number): boolean {
    const track = this.currentTrack;
    if (!track || this.phase === PlaybackPhase.Stopped) {
      log.debug('Ignoring seek: no track loaded');
      return false;
    }

    // Unknown duration: only the lower bound applies
    if (track.duration <= 0) {
      this.position = Math.max(0, target);
      this.issue({ type: 'seek', position: this.position });
      return true;
    }

    const clamped = clamp(target, 0, track.duration);
    if (clamped >= track.duration) {
      this.finishTrack();
      return true;
    }
    this.position = clamped;
    this.issue({ type: 'seek', position: clamped });
    return true;
  }

  next(): boolean {
    const track = this.pickAdjacent('next', this.repeat === RepeatMode.RepeatAll);
    if (!track) {
      log.debug('Ignoring next: end of view');
      return false;
    }
    this.start(track);
    return true;
  }

  previous(): boolean {
    const track = this.pickAdjacent('previous', this.repeat === RepeatMode.RepeatAll);
    if (!track) {
      log.debug('Ignoring previous: start of view');
      return false;
    }
    this.start(track);
    return true;
  }

  // ===== Volume =====

  setVolume(level: number): boolean {
    const next = clamp(Math.round(level), 0, 100);
    if (next === this.volume) return false;
    this.volume = next;
    this.issue({ type: 'setVolume', level: next });
    return true;
  }

  changeVolume(delta: number): boolean {
    return this.setVolume(this.volume + delta);
  }

  setMuted(muted: boolean): boolean {
    if (muted === this.muted) return false;
    this.muted = muted;
    this.issue({ type: 'setMuted', muted });
    return true;
  }

  toggleMute(): boolean {
    return this.setMuted(!this.muted);
  }

  /**
   * Push volume and mute to a freshly started backend
   */
  syncOutput(): void {
    this.issue({ type: 'setVolume', level: this.volume });
    this.issue({ type: 'setMuted', muted: this.muted });
  }

  // ===== Shuffle & Repeat =====

  setShuffle(enabled: boolean): void {
    if (enabled === this.shuffle) return;
    this.shuffle = enabled;
    if (enabled) {
      this.setQueue(this.queue);
    }
  }

  toggleShuffle(): boolean {
    this.setShuffle(!this.shuffle);
    return this.shuffle;
  }

  cycleRepeat(): RepeatMode {
    this.repeat = REPEAT_CYCLE[this.repeat];
    return this.repeat;
  }

  // ===== Backend reconciliation =====

  /**
   * Apply every pending backend event. Returns how many were accepted.
   */
  reconcile(): number {
    let accepted = 0;
    for (const event of this.backend.drain()) {
      if (this.handleEvent(event)) accepted++;
    }
    return accepted;
  }

  handleEvent(event: AudioEvent): boolean {
    switch (event.type) {
      case 'position':
        return this.applyPosition(event.seq, event.position);
      case 'endOfTrack':
        if (event.seq < this.loadSeq || !this.currentTrack) {
          log.debug(`Dropping stale end-of-track (seq ${event.seq}, loaded at ${this.loadSeq})`);
          return false;
        }
        this.finishTrack();
        return true;
      case 'error':
        return this.applyError(event.seq, event.reason);
    }
  }

  // ===== Event subscription =====

  on(listener: TransportListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ===== Internals =====

  private applyPosition(seq: number, reported: number): boolean {
    const track = this.currentTrack;
    if (seq !== this.seq || !track) {
      log.debug(`Dropping stale position report (seq ${seq}, latest ${this.seq})`);
      return false;
    }
    if (this.phase !== PlaybackPhase.Playing) {
      return false;
    }
    const position = track.duration > 0 ? clamp(reported, 0, track.duration) : Math.max(0, reported);
    if (position < this.position) {
      return false;
    }
    this.position = position;
    return true;
  }

  private applyError(seq: number, reason: string): boolean {
    if (seq < this.loadSeq || !this.currentTrack) {
      log.debug(`Dropping error for an earlier track (seq ${seq}): ${reason}`);
      return false;
    }
    const track = this.currentTrack;
    log.error(`Backend failed on "${track.title}": ${reason}`);
    this.issue({ type: 'stop' });
    this.clearTrack();
    this.emit({ type: 'error', track, reason });
    return true;
  }

  /**
   * End-of-track resolution, shared by natural ends and seeks past the end
   */
  private finishTrack(): void {
    const track = this.currentTrack;
    if (!track) return;

    if (this.repeat === RepeatMode.RepeatOne) {
      this.start(track);
      return;
    }

    const next = this.pickAdjacent('next', this.repeat === RepeatMode.RepeatAll);
    if (next) {
      this.start(next);
    } else {
      this.stop();
    }
  }

  private pickAdjacent(direction: 'next' | 'previous', wrap: boolean): Track | null {
    if (this.queue.length === 0) return null;

    if (this.shuffle) {
      const id = direction === 'next' ? this.shuffleOrder.next(wrap) : this.shuffleOrder.previous(wrap);
      return id === null ? null : this.queue.find((t) => t.id === id) ?? null;
    }

    const base = this.baseIndex(direction);
    let index = direction === 'next' ? base + 1 : base - 1;
    if (index >= this.queue.length || index < 0) {
      if (!wrap) return null;
      index = (index + this.queue.length) % this.queue.length;
    }
    return this.queue[index];
  }

  private baseIndex(direction: 'next' | 'previous'): number {
    const ids = [this.currentTrack?.id ?? null, this.anchor()];
    for (const id of ids) {
      if (id === null) continue;
      const index = this.queue.findIndex((t) => t.id === id);
      if (index !== -1) return index;
    }
    return direction === 'next' ? -1 : this.queue.length;
  }

  private start(track: Track): void {
    this.currentTrack = track;
    this.phase = PlaybackPhase.Playing;
    this.position = 0;
    this.loadSeq = this.issue({ type: 'load', path: track.path, duration: track.duration });
    this.issue({ type: 'play' });
    log.info(`Playing "${track.title}"`);
    this.emit({ type: 'trackChange', track });
  }

  private issue(body: AudioCommandBody): number {
    this.seq += 1;
    this.backend.send({ ...body, seq: this.seq });
    return this.seq;
  }

  private clearTrack(): void {
    this.currentTrack = null;
    this.phase = PlaybackPhase.Stopped;
    this.position = 0;
  }

  private emit(event: TransportEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
