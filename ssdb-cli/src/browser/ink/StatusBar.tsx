/**
 * Status bar (bottom row): database banner + version | keybinding hints.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface StatusBarProps {
  banner: string;
  version: string;
  filter: string;
  matchCount: number;
  /** Style and view keys are live. */
  keybindings: boolean;
}

export function StatusBar({ banner, version, filter, matchCount, keybindings }: StatusBarProps): React.ReactElement {
  return (
    <Box height={1} width="100%">
      <Box flexGrow={1}>
        <Text bold color="magenta" wrap="truncate">{banner}</Text>
        <Text dimColor> v{version}</Text>
        {filter && (
          <Text color="yellow">  filter: "{filter}" ({matchCount})</Text>
        )}
      </Box>

      <Box>
        <Text dimColor>{'│'} </Text>
        <Text>
          <Text bold>{'↑↓'}</Text><Text dimColor> nav </Text>
          <Text bold>Tab</Text><Text dimColor> list </Text>
          {keybindings && (
            <>
              <Text bold>s</Text><Text dimColor> style </Text>
              <Text bold>v</Text><Text dimColor> view </Text>
            </>
          )}
          <Text bold>/</Text><Text dimColor> filter </Text>
          <Text bold>?</Text><Text dimColor> help </Text>
          <Text bold>q</Text><Text dimColor> quit</Text>
        </Text>
      </Box>
    </Box>
  );
}
