import { Box, Text } from 'ink';
import { useStore } from 'zustand';
import type { StoreApi } from 'zustand/vanilla';
import type { ToastState } from '../notifier/toastNotifier';

export function Toast({ store }: { store: StoreApi<ToastState> }) {
  const toast = useStore(store, (state) => state.toast);
  if (!toast) return null;

  return (
    <Box borderStyle="round" borderColor={toast.level === 'error' ? 'red' : 'green'} paddingX={1}>
      <Text>{toast.message}</Text>
    </Box>
  );
}
