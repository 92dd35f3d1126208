import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { createTrack } from '@riffline/shared';
import { ToastNotifier } from '../../notifier/toastNotifier';
import { Toast } from '../Toast';

describe('Toast', () => {
  it('should render nothing until a notification arrives', () => {
    const notifier = new ToastNotifier({ translate: (key) => key });
    const { lastFrame } = render(<Toast store={notifier.store} />);

    expect(lastFrame()).toBe('');
  });

  it('should show the latest notification and hide it once expired', () => {
    const notifier = new ToastNotifier({ ttlMs: 100, now: () => 0, translate: (key, params) => `${key} ${params?.title}` });
    const { lastFrame } = render(<Toast store={notifier.store} />);

    notifier.notify({ type: 'pause', track: createTrack({ path: '/music/alpha.mp3', title: 'Alpha' }) });
    expect(lastFrame()).toContain('notify.paused Alpha');

    notifier.expire(100);
    expect(lastFrame()).toBe('');
  });
});
