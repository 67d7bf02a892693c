/**
 * Shown when the terminal is below the minimum dimensions.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface TooSmallOverlayProps {
  columns: number;
  rows: number;
  minColumns: number;
  minRows: number;
}

export function TooSmallOverlay({ columns, rows, minColumns, minRows }: TooSmallOverlayProps): React.ReactElement {
  return (
    <Box
      flexDirection="column"
      width={columns}
      height={rows}
      justifyContent="center"
      alignItems="center"
    >
      <Box
        flexDirection="column"
        borderStyle="single"
        borderColor="red"
        paddingX={2}
        paddingY={1}
      >
        <Text color="red">Terminal too small</Text>
        <Text color="gray">Need at least {minColumns}x{minRows} (current: {columns}x{rows})</Text>
      </Box>
    </Box>
  );
}
