import { createLogger, type PlaylistRepository, type Session } from '@riffline/shared';

const log = createLogger('Autosave');

export interface PlaylistAutosave {
  /** Wait for every save started so far */
  flush(): Promise<void>;
  stop(): void;
}

/**
 * Save the playlists whenever a published snapshot follows a playlist
 * change. Saves run one at a time, in order; a failed save is reported on
 * the status line and the next change tries again.
 */
export function autosavePlaylists(session: Session, repository: PlaylistRepository): PlaylistAutosave {
  let saved = JSON.stringify(session.playlistRecord());
  let chain: Promise<void> = Promise.resolve();

  const unsubscribe = session.store.subscribe(() => {
    const record = session.playlistRecord();
    const serialized = JSON.stringify(record);
    if (serialized === saved) return;
    saved = serialized;

    chain = chain.then(() =>
      repository.save(record).catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        log.error('Saving playlists failed', error);
        session.setStatus('status.saveFailed', { reason }, 'error');
      })
    );
  });

  return {
    flush: () => chain,
    stop: unsubscribe,
  };
}
