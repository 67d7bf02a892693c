/**
 * Help overlay showing all keybindings, centered over the browser.
 * Dot-leader alignment for consistent visual hierarchy.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface HelpOverlayProps {
  keybindings: boolean;
}

/** Render a key-description row with dot-leader fill. */
function helpRow(key: string, desc: string, keyWidth = 14, totalWidth = 54): React.ReactElement {
  const padding = keyWidth - key.length;
  const dotCount = Math.max(1, totalWidth - keyWidth - desc.length);
  const dots = '·'.repeat(dotCount);
  return (
    <Text key={key}>
      {'  '}<Text bold>{key}</Text>{' '.repeat(Math.max(0, padding))} <Text dimColor>{dots}</Text> {desc}
    </Text>
  );
}

export function HelpOverlay({ keybindings }: HelpOverlayProps): React.ReactElement {
  return (
    <Box
      position="absolute"
      width="100%"
      height="100%"
      alignItems="center"
      justifyContent="center"
    >
      <Box
        flexDirection="column"
        borderStyle="single"
        borderColor="magenta"
        paddingX={1}
        paddingY={1}
        width={60}
      >
        <Text bold color="magenta">  Disulfide Browser</Text>
        <Text> </Text>

        <Text bold>  Navigation</Text>
        {helpRow('Tab', 'Switch entries / disulfides')}
        {helpRow('j / ↓', 'Next entry or disulfide')}
        {helpRow('k / ↑', 'Previous entry or disulfide')}
        {helpRow('g / G', 'First / last')}
        {helpRow('Enter', 'Go to the disulfide list')}
        {helpRow('/', 'Filter entries by id')}
        <Text> </Text>

        <Text bold>  Rendering{keybindings ? '' : ' (keys disabled)'}</Text>
        {helpRow('s', 'Next style (single view)')}
        {helpRow('1 / 2 / 3', 'Split Bonds / CPK / Ball and Stick')}
        {helpRow('v', 'Toggle single view')}
        {helpRow('r', 'Re-render current disulfide')}
        <Text> </Text>

        <Text bold>  General</Text>
        {helpRow('?', 'Toggle this help')}
        {helpRow('Esc', 'Close overlay / clear filter')}
        {helpRow('q / Ctrl+C', 'Quit')}
      </Box>
    </Box>
  );
}
