import { useEffect } from 'react';
import { useStdin } from 'ink';
import type { Session } from '@riffline/shared';
import { parseKeys } from '../input/parseKeys';

/**
 * Put stdin in raw mode and queue every decoded key on the session.
 * Keys are applied by the next ticks, one per tick.
 */
export function useKeyInput(session: Session) {
  const { stdin, setRawMode, isRawModeSupported } = useStdin();

  useEffect(() => {
    if (!isRawModeSupported) return;

    setRawMode(true);
    const handleData = (data: string | Buffer) => {
      for (const event of parseKeys(String(data))) {
        session.enqueueInput(event);
      }
    };
    stdin.on('data', handleData);

    return () => {
      stdin.off('data', handleData);
      setRawMode(false);
    };
  }, [session, stdin, setRawMode, isRawModeSupported]);
}
