import { Box, Text } from 'ink';
import { useTranslation } from '@riffline/shared';

interface PlaylistNamePopupProps {
  value: string;
  markedCount: number;
}

export function PlaylistNamePopup({ value, markedCount }: PlaylistNamePopupProps) {
  const { t } = useTranslation();

  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      <Text bold>
        {t('label.newPlaylist')}
        {markedCount > 0 ? ` (${t('label.marked', { count: markedCount })})` : ''}
      </Text>
      <Text>&gt; {value}▏</Text>
      <Text dimColor>{t('label.newPlaylistHint')}</Text>
    </Box>
  );
}
