/**
 * Toast notification displayed at the top-right of the screen.
 * Auto-dismissed by the parent component via timers.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ToastEntry, ToastSeverity } from '../browserState';

const SEVERITY_COLOR: Record<ToastSeverity, string> = {
  error: 'red',
  warning: 'yellow',
  info: 'cyan',
};

const SEVERITY_ICON: Record<ToastSeverity, string> = {
  error: '✘',
  warning: '⚠',
  info: '●',
};

interface ToastNotificationProps {
  toast: ToastEntry;
  columns: number;
}

export function ToastNotification({ toast, columns }: ToastNotificationProps): React.ReactElement {
  const color = SEVERITY_COLOR[toast.severity];
  const truncMsg = toast.message.length > 56 ? toast.message.substring(0, 53) + '...' : toast.message;

  return (
    <Box
      position="absolute"
      marginLeft={Math.max(0, columns - truncMsg.length - 8)}
      marginTop={0}
      borderStyle="single"
      borderColor={color}
      paddingX={1}
    >
      <Text color={color}>{SEVERITY_ICON[toast.severity]} {truncMsg}</Text>
    </Box>
  );
}
