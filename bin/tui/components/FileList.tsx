import { Box, Text } from 'ink';
import React from 'react';

import type { ScreenModel } from '../../../src/render-model.js';

interface FileListProps {
  list: ScreenModel['list'];
  accent: string;
}

export const FileList: React.FC<FileListProps> = ({ list, accent }) => (
  <Box
    flexDirection="column"
    width={list.width + 2}
    height={list.height + 2}
    borderStyle="round"
    borderColor={accent}
  >
    {list.emptyMessage ? (
      <Text dimColor italic>
        {list.emptyMessage}
      </Text>
    ) : (
      list.rows.map((row) => (
        <Box key={row.key}>
          <Text wrap="truncate-end" inverse={row.selected}>
            <Text>{row.icon} </Text>
            {row.segments.map((segment, i) => (
              <Text
                key={i}
                color={segment.match ? 'yellow' : row.directory ? 'cyan' : undefined}
                bold={segment.match || row.directory}
              >
                {segment.text}
              </Text>
            ))}
            {row.hint && <Text dimColor>{`  ${row.hint}`}</Text>}
          </Text>
        </Box>
      ))
    )}
  </Box>
);
