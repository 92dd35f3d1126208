/**
 * In-app notifier: playback events become a short-lived toast in the
 * corner of the terminal. State lives in a vanilla zustand store so the
 * Toast component can subscribe without owning any timers.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { i18n, type MessageParams, type NotificationEvent, type Notifier, type StatusLevel } from '@riffline/shared';

export interface Toast {
  id: number;
  message: string;
  level: StatusLevel;
  expiresAt: number;
}

export interface ToastState {
  toast: Toast | null;
}

export type Translate = (key: string, params?: MessageParams) => string;

export interface ToastNotifierOptions {
  ttlMs?: number;
  translate?: Translate;
  now?: () => number;
}

const defaultTranslate: Translate = (key, params) => String(i18n.t(key, params));

function describe(event: NotificationEvent): { key: string; params: MessageParams; level: StatusLevel } {
  switch (event.type) {
    case 'trackChange':
      return { key: 'notify.nowPlaying', params: { title: event.track.title, artist: event.track.artist }, level: 'info' };
    case 'pause':
      return { key: 'notify.paused', params: { title: event.track.title }, level: 'info' };
    case 'resume':
      return { key: 'notify.resumed', params: { title: event.track.title }, level: 'info' };
    case 'error':
      return { key: 'notify.error', params: { reason: event.reason }, level: 'error' };
  }
}

export class ToastNotifier implements Notifier {
  readonly store: StoreApi<ToastState> = createStore<ToastState>(() => ({ toast: null }));
  private readonly ttlMs: number;
  private readonly translate: Translate;
  private readonly now: () => number;
  private nextId = 1;

  constructor(options: ToastNotifierOptions = {}) {
    this.ttlMs = options.ttlMs ?? 4000;
    this.translate = options.translate ?? defaultTranslate;
    this.now = options.now ?? Date.now;
  }

  notify(event: NotificationEvent): void {
    const { key, params, level } = describe(event);
    this.store.setState({
      toast: { id: this.nextId++, message: this.translate(key, params), level, expiresAt: this.now() + this.ttlMs },
    });
  }

  /** Drop the toast once its time is up */
  expire(now = this.now()): void {
    const { toast } = this.store.getState();
    if (toast && now >= toast.expiresAt) {
      this.store.setState({ toast: null });
    }
  }
}
