/**
 * Display surface: draws the current render handle inside a bordered box
 * sized by the surface layout, with an optional atom legend.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { atomColors } from 'ssdb-shared';
import type { AtomElement, RenderSurface, StyledLine, SurfaceLayout } from 'ssdb-shared';

const LEGEND: Array<{ element: AtomElement; name: string }> = [
  { element: 'N', name: 'nitrogen' },
  { element: 'C', name: 'carbon' },
  { element: 'S', name: 'sulfur' },
];

function lineWidth(line: StyledLine): number {
  return line.reduce((n, seg) => n + [...seg.text].length, 0);
}

function StyledText({ line }: { line: StyledLine }): React.ReactElement {
  if (line.length === 0) return <Text> </Text>;
  return (
    <Text wrap="truncate">
      {line.map((seg, i) => (
        <Text key={i} color={seg.color} bold={seg.bold} dimColor={seg.dim}>{seg.text}</Text>
      ))}
    </Text>
  );
}

function Legend({ light }: { light: boolean }): React.ReactElement {
  const colors = atomColors(light);
  return (
    <Box flexDirection="column" marginLeft={2}>
      {LEGEND.map(({ element, name }) => (
        <Text key={element}>
          <Text color={colors[element]}>●</Text> <Text bold>{element}</Text> <Text dimColor>{name}</Text>
        </Text>
      ))}
    </Box>
  );
}

interface RenderPaneProps {
  surface: RenderSurface | null;
  /** Used until the first surface arrives. */
  layout: Readonly<SurfaceLayout>;
}

export function RenderPane({ surface, layout: fallback }: RenderPaneProps): React.ReactElement {
  const layout = surface?.layout ?? fallback;
  const lines = surface?.handle.lines ?? [];
  const contentWidth = lines.reduce((w, line) => Math.max(w, lineWidth(line)), 0);
  // Rows inside the border
  const innerHeight = Math.max(layout.minHeight, 1);
  const legendWidth = layout.orientationWidget ? 16 : 0;

  const sizeProps = layout.sizing === 'fixed'
    ? { width: contentWidth + legendWidth + 2 * layout.margin + 2, height: innerHeight + 2 * layout.margin + 2 }
    : layout.sizing === 'stretch_width'
      ? { flexGrow: 1, height: innerHeight + 2 * layout.margin + 2 }
      : { flexGrow: 1, minHeight: innerHeight + 2 * layout.margin + 2 };

  return (
    <Box
      {...sizeProps}
      flexDirection="row"
      borderStyle="single"
      borderColor="gray"
      padding={layout.margin}
      overflow="hidden"
    >
      <Box flexDirection="column" flexGrow={1}>
        {surface ? (
          lines.map((line, i) => <StyledText key={`${surface.serial}-${i}`} line={line} />)
        ) : (
          <Text color="gray">(nothing rendered yet)</Text>
        )}
      </Box>
      {layout.orientationWidget && surface && <Legend light={surface.handle.lightMode} />}
    </Box>
  );
}
