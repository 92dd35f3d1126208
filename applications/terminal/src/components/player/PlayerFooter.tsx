import { Box, Text } from 'ink';
import { RepeatMode, useTranslation, type StatusMessage, type TransportSnapshot } from '@riffline/shared';
import { TrackInfo } from './TrackInfo';
import { ProgressBar } from './ProgressBar';

interface PlayerFooterProps {
  transport: TransportSnapshot;
  status: Readonly<StatusMessage> | null;
  markedCount: number;
  width: number;
}

/**
 * Now playing, progress, playback flags and the status line
 */
export function PlayerFooter({ transport, status, markedCount, width }: PlayerFooterProps) {
  const { t } = useTranslation();

  const flags = [
    transport.muted ? t('label.muted') : t('label.volume', { volume: transport.volume }),
    transport.shuffle ? t('label.shuffle') : null,
    transport.repeat !== RepeatMode.Off ? t('label.repeat', { mode: t(`repeat.${transport.repeat}`) }) : null,
    markedCount > 0 ? t('label.marked', { count: markedCount }) : null,
  ].filter((flag): flag is string => flag !== null);

  return (
    <Box flexDirection="column" borderStyle="single" borderLeft={false} borderRight={false} borderBottom={false}>
      <TrackInfo phase={transport.phase} track={transport.track} />
      <ProgressBar position={transport.position} duration={transport.duration} width={width} />
      <Text dimColor>{flags.join(' · ')}</Text>
      <Text color={status?.level === 'error' ? 'red' : 'yellow'}>{status ? t(status.key, status.params) : ' '}</Text>
    </Box>
  );
}
