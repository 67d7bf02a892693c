/**
 * Side list (entries or items) with bordered container, windowed
 * scrolling and selection highlight.
 */

import React from 'react';
import { Box, Text } from 'ink';

/** Cut a label to `maxVisible` characters, ending in an ellipsis. */
export function truncateLabel(label: string, maxVisible: number): string {
  if (label.length <= maxVisible) return label;
  return label.substring(0, Math.max(0, maxVisible - 1)) + '…';
}

interface SideListProps {
  items: readonly string[];
  /** -1 when nothing in the list is selected. */
  selectedIndex: number;
  scrollOffset: number;
  focused: boolean;
  /** Dimmed and not navigable, e.g. an entry without items. */
  disabled?: boolean;
  width: number;
  viewportHeight: number;
  panelTitle: string;
  emptyStateHint?: string;
}

export function SideList({
  items,
  selectedIndex,
  scrollOffset,
  focused,
  disabled,
  width,
  viewportHeight,
  panelTitle,
  emptyStateHint,
}: SideListProps): React.ReactElement {
  const borderColor = disabled ? 'gray' : focused ? 'magenta' : 'gray';
  const borderStyle = focused ? 'double' : 'single';
  // Inner width minus border (2) and padding (1)
  const innerWidth = Math.max(1, width - 3);

  const visibleItems = items.slice(scrollOffset, scrollOffset + viewportHeight);
  const hasMoreAbove = scrollOffset > 0;
  const hasMoreBelow = scrollOffset + viewportHeight < items.length;
  const showHint = items.length === 0 && viewportHeight >= 2;
  const fill = Math.max(0, viewportHeight - visibleItems.length - (showHint ? 2 : 0));

  return (
    <Box
      width={width}
      flexDirection="column"
      borderStyle={borderStyle}
      borderColor={borderColor}
      overflow="hidden"
    >
      <Box>
        <Text color={borderColor} dimColor={disabled}> {panelTitle} ({items.length}) </Text>
      </Box>

      {hasMoreAbove && (
        <Box justifyContent="center" width={innerWidth}>
          <Text color="gray">▲</Text>
        </Box>
      )}

      {visibleItems.map((item, i) => {
        const isSelected = scrollOffset + i === selectedIndex;
        const label = truncateLabel(item, innerWidth - 2);
        return (
          <Box key={item} width={innerWidth}>
            {isSelected && !disabled ? (
              <Text inverse>
                <Text bold>▸</Text> {label}
              </Text>
            ) : (
              <Text dimColor={disabled}>
                {isSelected ? '▸' : ' '} {label}
              </Text>
            )}
          </Box>
        );
      })}

      {showHint && (
        <>
          <Box width={innerWidth}><Text> </Text></Box>
          <Box justifyContent="center" width={innerWidth}>
            <Text color="gray">{emptyStateHint ?? 'Nothing here'}</Text>
          </Box>
        </>
      )}

      {Array.from({ length: fill }, (_, i) => (
        <Box key={`empty-${i}`} width={innerWidth}>
          <Text> </Text>
        </Box>
      ))}

      {hasMoreBelow && (
        <Box justifyContent="center" width={innerWidth}>
          <Text color="gray">▼</Text>
        </Box>
      )}
    </Box>
  );
}
