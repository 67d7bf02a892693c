/**
 * Entry filter input shown at the bottom of the screen.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface FilterBarProps {
  filter: string;
  matchCount: number;
  rows: number;
}

export function FilterBar({ filter, matchCount, rows }: FilterBarProps): React.ReactElement {
  return (
    <Box
      position="absolute"
      marginTop={Math.max(0, rows - 2)}
      width="100%"
      height={1}
    >
      <Text bold color="magenta"> / </Text>
      <Text color={matchCount === 0 ? 'red' : undefined}>{filter}</Text>
      <Text color="gray">█</Text>
      <Text dimColor>  {matchCount} {matchCount === 1 ? 'entry' : 'entries'}</Text>
    </Box>
  );
}
