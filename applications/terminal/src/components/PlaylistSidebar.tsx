import { Box, Text } from 'ink';
import { truncate, useTranslation, type PlaylistsSnapshot } from '@riffline/shared';

interface PlaylistSidebarProps {
  playlists: PlaylistsSnapshot;
  width: number;
}

/**
 * Library entry plus saved playlists. `>` marks the highlight, `●` the
 * playlist whose tracks are on screen.
 */
export function PlaylistSidebar({ playlists, width }: PlaylistSidebarProps) {
  const { t } = useTranslation();

  return (
    <Box flexDirection="column" width={width} marginRight={1}>
      <Text bold>{t('label.playlists')}</Text>
      {playlists.entries.map((entry, index) => {
        const highlighted = index === playlists.cursor;
        const open = entry.name === playlists.active;
        const name = entry.name ?? t('label.library');
        const count = ` ${entry.trackCount}`;
        const label = truncate(name, width - 4 - count.length);
        return (
          <Text key={entry.name ?? ''} inverse={highlighted}>
            {`${highlighted ? '>' : ' '}${open ? '●' : ' '} ${label}`.padEnd(width - count.length) + count}
          </Text>
        );
      })}
    </Box>
  );
}
