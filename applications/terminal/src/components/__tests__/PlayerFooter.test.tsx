import { beforeAll, describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { PlaybackPhase, RepeatMode, createTrack, initI18n, type TransportSnapshot } from '@riffline/shared';
import { PlayerFooter } from '../player/PlayerFooter';
import { renderProgressBar } from '../format';

const alpha = createTrack({ path: '/music/alpha.mp3', title: 'Alpha', artist: 'Cid', album: 'Iron', duration: 120 });

const transport = (overrides: Partial<TransportSnapshot> = {}): TransportSnapshot => ({
  phase: PlaybackPhase.Playing,
  track: alpha,
  position: 30,
  duration: 120,
  volume: 80,
  muted: false,
  shuffle: true,
  repeat: RepeatMode.RepeatOne,
  ...overrides,
});

beforeAll(() => {
  initI18n('en-US');
});

describe('PlayerFooter', () => {
  it('should show the playing track, progress and flags', () => {
    const { lastFrame } = render(<PlayerFooter transport={transport()} status={null} markedCount={2} width={40} />);

    const frame = lastFrame() ?? '';
    expect(frame).toContain('Playing');
    expect(frame).toContain('Alpha');
    expect(frame).toContain(' - Cid (Iron)');
    expect(frame).toContain(renderProgressBar(30, 120, 30));
    expect(frame).toContain('0:30');
    expect(frame).toContain('2:00');
    expect(frame).toContain('Vol 80% · Shuffle · Repeat: one · 2 marked');
  });

  it('should show the status message', () => {
    const { lastFrame } = render(
      <PlayerFooter
        transport={transport()}
        status={{ key: 'status.addedToPlaylist', params: { title: 'Alpha', name: 'Road Trip' }, level: 'info' }}
        markedCount={0}
        width={40}
      />
    );

    expect(lastFrame()).toContain('Added "Alpha" to Road Trip');
  });

  it('should show the idle state', () => {
    const idle = transport({
      phase: PlaybackPhase.Stopped,
      track: null,
      position: 0,
      duration: 0,
      muted: true,
      shuffle: false,
      repeat: RepeatMode.Off,
    });
    const { lastFrame } = render(<PlayerFooter transport={idle} status={null} markedCount={0} width={40} />);

    const frame = lastFrame() ?? '';
    expect(frame).toContain('Nothing playing');
    expect(frame).toContain('Muted');
    expect(frame).not.toContain('Shuffle');
  });
});
