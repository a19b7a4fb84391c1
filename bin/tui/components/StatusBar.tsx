import { Box, Text } from 'ink';
import React from 'react';

interface StatusBarProps {
  text: string;
  searching: boolean;
}

export const StatusBar: React.FC<StatusBarProps> = ({ text, searching }) => (
  <Box paddingX={1}>
    <Text color={searching ? 'yellow' : 'gray'} wrap="truncate-end">
      {text}
    </Text>
  </Box>
);
