import { Box, Text } from 'ink';
import { useTranslation, type TrackRow } from '@riffline/shared';
import { formatColumns, formatTrackRow, visibleWindow } from './format';

interface TrackListProps {
  rows: readonly TrackRow[];
  selection: number | null;
  /** Rows available for tracks, header excluded */
  height: number;
  width: number;
  search: string;
}

export function TrackList({ rows, selection, height, width, search }: TrackListProps) {
  const { t } = useTranslation();

  if (rows.length === 0) {
    return (
      <Box flexDirection="column" width={width}>
        <Text dimColor>{search ? t('label.noMatches', { search }) : t('label.noTracks')}</Text>
      </Box>
    );
  }

  const { start, end } = visibleWindow(rows.length, selection, height);
  const header = formatColumns('', t('label.title'), t('label.artist'), t('label.album'), t('label.duration'), width);

  return (
    <Box flexDirection="column" width={width}>
      <Text bold>{header}</Text>
      {rows.slice(start, end).map((row, offset) => {
        const index = start + offset;
        return (
          <Text key={row.id} inverse={index === selection} color={row.playing ? 'green' : undefined}>
            {formatTrackRow(row, width)}
          </Text>
        );
      })}
    </Box>
  );
}
