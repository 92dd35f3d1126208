import { Box, Text } from 'ink';
import { useTranslation, type SearchScope, type SortCriterion } from '@riffline/shared';

interface SearchBarProps {
  search: string;
  scope: SearchScope;
  sort: SortCriterion;
  focused: boolean;
}

export function SearchBar({ search, scope, sort, focused }: SearchBarProps) {
  const { t } = useTranslation();

  return (
    <Box>
      <Text color={focused ? 'cyan' : undefined}>
        {t('label.search')}: {search}
        {focused ? '▏' : ''}
      </Text>
      <Text dimColor>
        {' '}
        {t('label.searchScope', { scope: t(`scope.${scope}`) })} · {t('label.sort', { sort: t(`sort.${sort}`) })}
      </Text>
    </Box>
  );
}
