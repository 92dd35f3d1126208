export type Direction = -1 | 1;

export type Action =
  // Navigation
  | { type: 'moveSelection'; delta: Direction }
  | { type: 'movePage'; direction: Direction }
  | { type: 'selectEdge'; edge: 'first' | 'last' }
  // Transport
  | { type: 'playOrStop' }
  | { type: 'togglePause' }
  | { type: 'stop' }
  | { type: 'toggleMute' }
  | { type: 'seek'; direction: Direction }
  | { type: 'volume'; direction: Direction }
  | { type: 'next' }
  | { type: 'previous' }
  // Modes
  | { type: 'toggleShuffle' }
  | { type: 'cycleRepeat' }
  | { type: 'cycleSort' }
  | { type: 'cycleSearchScope' }
  | { type: 'focusSearch' }
  // Search field
  | { type: 'searchInput'; text: string }
  | { type: 'searchBackspace' }
  | { type: 'searchClear' }
  | { type: 'blurSearch' }
  // Playlists
  | { type: 'openPlaylistName' }
  | { type: 'playlistNameInput'; text: string }
  | { type: 'playlistNameBackspace' }
  | { type: 'submitPlaylistName' }
  | { type: 'playlistCursor'; direction: Direction }
  | { type: 'openPlaylist' }
  | { type: 'movePlaylist'; direction: Direction }
  | { type: 'deletePlaylist' }
  | { type: 'addSelectedToPlaylist' }
  | { type: 'removeSelectedFromPlaylist' }
  | { type: 'toggleMark' }
  // UI
  | { type: 'toggleHelp' }
  | { type: 'closePopup' }
  | { type: 'rescan' }
  | { type: 'quit' };

export type ActionType = Action['type'];
