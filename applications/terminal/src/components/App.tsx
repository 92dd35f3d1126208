import { useEffect } from 'react';
import { Box, Text, useApp, useStdout } from 'ink';
import { useStore } from 'zustand';
import { useTranslation, type Session } from '@riffline/shared';
import { TrackList } from './TrackList';
import { PlaylistSidebar } from './PlaylistSidebar';
import { SearchBar } from './SearchBar';
import { HelpPopup } from './HelpPopup';
import { PlaylistNamePopup } from './PlaylistNamePopup';
import { Toast } from './Toast';
import { PlayerFooter } from './player/PlayerFooter';
import { useSessionLoop } from '../hooks/useSessionLoop';
import { useKeyInput } from '../hooks/useKeyInput';
import type { ToastNotifier } from '../notifier/toastNotifier';

const SIDEBAR_WIDTH = 24;
// Title, search bar, list header, footer (border + four lines)
const CHROME_ROWS = 9;

interface AppProps {
  session: Session;
  toasts: ToastNotifier;
  tickMs: number;
}

export function App({ session, toasts, tickMs }: AppProps) {
  const { t } = useTranslation();
  const { exit } = useApp();
  const { stdout } = useStdout();
  const snapshot = useStore(session.store, (state) => state.snapshot);

  useSessionLoop(session, tickMs, toasts);
  useKeyInput(session);

  useEffect(() => session.onQuit(() => exit()), [session, exit]);

  const columns = stdout.columns || 80;
  const rows = stdout.rows || 24;
  const listWidth = Math.max(20, columns - SIDEBAR_WIDTH - 1);
  const listHeight = Math.max(1, rows - CHROME_ROWS);

  return (
    <Box flexDirection="column" width={columns}>
      <Box justifyContent="space-between">
        <Text bold color="cyan">
          {t('app.title')}
        </Text>
        <Text dimColor>
          {t('label.trackCount', { count: snapshot.catalogSize })} · {t('app.helpHint')}
        </Text>
      </Box>
      <SearchBar
        search={snapshot.search}
        scope={snapshot.searchScope}
        sort={snapshot.sort}
        focused={snapshot.focus === 'search'}
      />
      {snapshot.popup === 'help' ? (
        <HelpPopup />
      ) : (
        <Box>
          <PlaylistSidebar playlists={snapshot.playlists} width={SIDEBAR_WIDTH} />
          {snapshot.popup === 'playlistName' ? (
            <PlaylistNamePopup value={snapshot.playlistNameInput} markedCount={snapshot.markedCount} />
          ) : (
            <TrackList
              rows={snapshot.rows}
              selection={snapshot.selection}
              height={listHeight}
              width={listWidth}
              search={snapshot.search}
            />
          )}
        </Box>
      )}
      <PlayerFooter
        transport={snapshot.transport}
        status={snapshot.status}
        markedCount={snapshot.markedCount}
        width={columns}
      />
      <Toast store={toasts.store} />
    </Box>
  );
}
