/**
 * Top row: current title, the style radio and the single-view checkbox.
 * The radio is greyed out while multi view ignores it.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { RENDER_STYLES, styleLabel } from 'ssdb-shared';
import type { RenderStyle } from 'ssdb-shared';

interface ControlBarProps {
  title: string;
  style: RenderStyle;
  singleView: boolean;
  styleEnabled: boolean;
}

export function ControlBar({ title, style, singleView, styleEnabled }: ControlBarProps): React.ReactElement {
  return (
    <Box height={1} width="100%">
      <Box flexGrow={1}>
        <Text bold color="magenta" wrap="truncate">{title}</Text>
      </Box>
      <Box>
        {RENDER_STYLES.map((s, i) => (
          <Box key={s} marginRight={1}>
            <Text color={styleEnabled ? (s === style ? 'magenta' : undefined) : 'gray'} bold={styleEnabled && s === style}>
              {s === style ? '(•)' : '( )'} {i + 1} {styleLabel(s)}
            </Text>
          </Box>
        ))}
        <Text dimColor>{'│'} </Text>
        <Text color={singleView ? 'cyan' : undefined}>[{singleView ? 'x' : ' '}] Single View</Text>
      </Box>
    </Box>
  );
}
