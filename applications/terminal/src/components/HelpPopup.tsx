import { Box, Text } from 'ink';
import { BROWSE_BINDINGS, useTranslation, type KeyBinding } from '@riffline/shared';

const LABEL_WIDTH = 11;

function BindingColumn({ bindings }: { bindings: readonly KeyBinding[] }) {
  const { t } = useTranslation();
  return (
    <Box flexDirection="column" marginRight={1}>
      {bindings.map((binding) => (
        <Text key={binding.help}>
          <Text color="cyan">{binding.label.padEnd(LABEL_WIDTH)}</Text>
          {t(binding.help)}
        </Text>
      ))}
    </Box>
  );
}

/**
 * Key reference, generated from the same table the dispatcher uses
 */
export function HelpPopup() {
  const { t } = useTranslation();
  const half = Math.ceil(BROWSE_BINDINGS.length / 2);

  return (
    <Box flexDirection="column" borderStyle="round">
      <Text bold>{t('label.help')}</Text>
      <Box>
        <BindingColumn bindings={BROWSE_BINDINGS.slice(0, half)} />
        <BindingColumn bindings={BROWSE_BINDINGS.slice(half)} />
      </Box>
      <Text dimColor>{t('label.closeHelp')}</Text>
    </Box>
  );
}
