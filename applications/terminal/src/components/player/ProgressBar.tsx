import { Text } from 'ink';
import { formatDuration } from '@riffline/shared';
import { renderProgressBar } from '../format';

interface ProgressBarProps {
  position: number;
  duration: number;
  width: number;
}

/**
 * Elapsed time, bar, total time on one line
 */
export function ProgressBar({ position, duration, width }: ProgressBarProps) {
  const elapsed = formatDuration(position);
  const total = formatDuration(duration);
  const barWidth = Math.max(0, width - elapsed.length - total.length - 2);

  return (
    <Text>
      {elapsed} <Text color="green">{renderProgressBar(position, duration, barWidth)}</Text> {total}
    </Text>
  );
}
