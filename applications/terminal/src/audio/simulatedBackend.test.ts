import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { PlaybackPhase, Session, createTrack } from '@riffline/shared';
import { SimulatedAudioBackend } from './simulatedBackend';

describe('SimulatedAudioBackend', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should report position tagged with the latest command', async () => {
    const backend = new SimulatedAudioBackend({ intervalMs: 100 });
    backend.send({ type: 'load', path: '/music/a.mp3', duration: 60, seq: 1 });
    backend.send({ type: 'play', seq: 2 });

    vi.advanceTimersByTime(200);
    backend.send({ type: 'setVolume', level: 40, seq: 3 });
    vi.advanceTimersByTime(100);

    expect(backend.drain()).toEqual([
      { type: 'position', seq: 2, position: 0.1 },
      { type: 'position', seq: 2, position: 0.2 },
      { type: 'position', seq: 3, position: 0.3 },
    ]);
    expect(backend.volume).toBe(40);
    await backend.dispose();
  });

  it('should end the track at its duration', async () => {
    const backend = new SimulatedAudioBackend({ intervalMs: 100 });
    backend.send({ type: 'load', path: '/music/a.mp3', duration: 0.25, seq: 1 });
    backend.send({ type: 'play', seq: 2 });

    vi.advanceTimersByTime(500);

    expect(backend.drain()).toEqual([
      { type: 'position', seq: 2, position: 0.1 },
      { type: 'position', seq: 2, position: 0.2 },
      { type: 'position', seq: 2, position: 0.25 },
      { type: 'endOfTrack', seq: 2 },
    ]);
    expect(backend.isPlaying).toBe(false);
    await backend.dispose();
  });

  it('should hold still while paused and jump on seek', async () => {
    const backend = new SimulatedAudioBackend({ intervalMs: 100 });
    backend.send({ type: 'load', path: '/music/a.mp3', duration: 60, seq: 1 });
    backend.send({ type: 'play', seq: 2 });
    backend.send({ type: 'pause', seq: 3 });

    vi.advanceTimersByTime(300);
    backend.send({ type: 'seek', position: 12, seq: 4 });

    expect(backend.drain()).toEqual([{ type: 'position', seq: 4, position: 12 }]);
    await backend.dispose();
  });

  it('should fail loads it is told to fail', async () => {
    const backend = new SimulatedAudioBackend({ failLoad: (path) => (path.endsWith('.opus') ? 'no decoder' : null) });
    backend.send({ type: 'load', path: '/music/b.opus', duration: 60, seq: 5 });

    expect(backend.drain()).toEqual([{ type: 'error', seq: 5, reason: 'no decoder' }]);
    expect(backend.currentPath).toBeNull();
    await backend.dispose();
  });

  it('should drive a session through a whole track', async () => {
    const backend = new SimulatedAudioBackend({ intervalMs: 100 });
    const first = createTrack({ path: '/music/first.mp3', title: 'First', duration: 1 });
    const second = createTrack({ path: '/music/second.mp3', title: 'Second', duration: 1 });
    const session = new Session({ backend, tracks: [first, second], shuffleSeed: 1 });

    session.enqueueInput({ key: 'enter' });
    session.tick();
    vi.advanceTimersByTime(500);
    expect(session.tick().transport.position).toBe(0.5);

    vi.advanceTimersByTime(600);
    const snapshot = session.tick();
    expect(snapshot.transport.track?.title).toBe('Second');
    expect(snapshot.transport.phase).toBe(PlaybackPhase.Playing);
    expect(snapshot.transport.position).toBe(0);
    await backend.dispose();
  });
});
