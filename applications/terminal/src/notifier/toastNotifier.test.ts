import { beforeAll, describe, it, expect } from 'vitest';
import { createTrack, initI18n } from '@riffline/shared';
import { ToastNotifier } from './toastNotifier';

const track = (title: string, artist = 'Band') => createTrack({ path: `/music/${title}.mp3`, title, artist });

beforeAll(() => {
  initI18n('en-US');
});

describe('ToastNotifier', () => {
  it('should show a translated toast for a track change', () => {
    const notifier = new ToastNotifier({ ttlMs: 1000, now: () => 5000 });

    notifier.notify({ type: 'trackChange', track: track('Alpha', 'Cid') });

    expect(notifier.store.getState().toast).toEqual({
      id: 1,
      message: 'Now playing: Alpha by Cid',
      level: 'info',
      expiresAt: 6000,
    });
  });

  it('should mark playback errors', () => {
    const notifier = new ToastNotifier({ now: () => 0 });

    notifier.notify({ type: 'pause', track: track('Alpha') });
    notifier.notify({ type: 'error', track: null, reason: 'no such file' });

    expect(notifier.store.getState().toast).toEqual({
      id: 2,
      message: 'Playback error: no such file',
      level: 'error',
      expiresAt: 4000,
    });
  });

  it('should expire the toast after its ttl', () => {
    const notifier = new ToastNotifier({ ttlMs: 1000, now: () => 0, translate: (key) => key });
    notifier.notify({ type: 'resume', track: track('Alpha') });

    notifier.expire(999);
    expect(notifier.store.getState().toast?.message).toBe('notify.resumed');

    notifier.expire(1000);
    expect(notifier.store.getState().toast).toBeNull();
  });
});
