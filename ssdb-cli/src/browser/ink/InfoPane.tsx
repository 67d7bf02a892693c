/**
 * Info region (disulfide details) above the one-line output region.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface InfoPaneProps {
  info: string;
  output: string;
}

export function InfoPane({ info, output }: InfoPaneProps): React.ReactElement {
  const lines = info.split('\n');
  const isError = output.startsWith('Error:');

  return (
    <Box flexDirection="column" flexShrink={0}>
      <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingLeft={1}>
        {lines.map((line, i) => (
          <Text key={i} bold={i === 0} wrap="truncate">{line}</Text>
        ))}
      </Box>
      <Box height={1} paddingLeft={1}>
        <Text color={isError ? 'red' : 'gray'} wrap="truncate">{output || ' '}</Text>
      </Box>
    </Box>
  );
}
