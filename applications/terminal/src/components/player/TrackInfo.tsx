import { Text } from 'ink';
import { PlaybackPhase, useTranslation, type Track } from '@riffline/shared';

const PHASE_ICON: Record<PlaybackPhase, string> = {
  [PlaybackPhase.Playing]: '▶',
  [PlaybackPhase.Paused]: '⏸',
  [PlaybackPhase.Stopped]: '■',
};

export function TrackInfo({ phase, track }: { phase: PlaybackPhase; track: Track | null }) {
  const { t } = useTranslation();

  if (!track) {
    return <Text dimColor>{t('label.nothingPlaying')}</Text>;
  }

  return (
    <Text>
      {PHASE_ICON[phase]} <Text dimColor>{t(`phase.${phase}`)}</Text> <Text bold>{track.title}</Text> - {track.artist} ({track.album})
    </Text>
  );
}
