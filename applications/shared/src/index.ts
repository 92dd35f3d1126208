// Types
export * from './types';

// i18n - internationalization
export { default as i18n, initI18n, useTranslation, I18nextProvider, SUPPORTED_LANGUAGES } from './i18n';

// Session engine
export { Session } from './session/session';
export type { SessionOptions, SessionStoreState } from './session/session';
export { buildSnapshot } from './session/snapshot';
export type {
  SessionSnapshot,
  SnapshotInput,
  TrackRow,
  TransportSnapshot,
  PlaylistEntry,
  PlaylistsSnapshot,
} from './session/snapshot';

// Catalog & view
export { Catalog, createTrack, trackIdFromPath, UNKNOWN_ARTIST, UNKNOWN_ALBUM } from './catalog/catalog';
export type { TrackInput } from './catalog/catalog';
export { ViewIndex, matchesSearch, stableSort } from './library/viewIndex';

// Playlists
export { PlaylistStore } from './playlists/playlistStore';
export type { MoveDirection } from './playlists/playlistStore';
export {
  playlistRecordSchema,
  parsePlaylistRecord,
  emptyPlaylistRecord,
  PLAYLIST_RECORD_VERSION,
} from './playlists/schema';
export type { PlaylistRecord, PlaylistRecordResult } from './playlists/schema';
export type { PlaylistRepository } from './playlists/repository';

// Transport & audio
export { Transport } from './transport/transport';
export type { TransportEvent, TransportListener, TransportOptions } from './transport/transport';
export { ShuffleOrder, seededShuffle, createRandom } from './transport/shuffle';
export type { AudioBackend, AudioCommand, AudioCommandBody, AudioEvent } from './audio/backend';

// Input
export { dispatch } from './dispatcher/dispatcher';
export { BROWSE_BINDINGS, findBinding, matchesKey } from './dispatcher/keymap';
export type { KeyBinding, KeyEvent, KeyName, KeySpec } from './dispatcher/keymap';
export type { Action, ActionType, Direction } from './dispatcher/actions';

// Notifications
export { deliverNotification } from './notifier/notifier';
export type { Notifier, NotificationEvent } from './notifier/notifier';

// Utils
export { clamp, formatDuration, truncate } from './lib/utils';
export { MessageQueue } from './lib/channel';
export { createLogger, setLogLevel, getLogLevel, setLogSink, isLogLevel } from './lib/logger';
export type { Logger, LogLevel, LogSink } from './lib/logger';
export {
  SessionError,
  NotFoundError,
  DuplicateNameError,
  InvalidStateError,
  isSessionError,
} from './lib/errors';
export type { SessionErrorCode } from './lib/errors';
