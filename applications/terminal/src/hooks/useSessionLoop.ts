import { useEffect } from 'react';
import type { Session } from '@riffline/shared';
import type { ToastNotifier } from '../notifier/toastNotifier';

/**
 * Drive the session from a fixed-rate interval for as long as the
 * component is mounted. Each tick also ages out the toast.
 */
export function useSessionLoop(session: Session, tickMs: number, toasts?: ToastNotifier) {
  useEffect(() => {
    const timer = setInterval(() => {
      session.tick();
      toasts?.expire();
    }, tickMs);

    return () => {
      clearInterval(timer);
    };
  }, [session, tickMs, toasts]);
}
