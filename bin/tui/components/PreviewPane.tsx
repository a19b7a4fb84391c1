import { Box, Text } from 'ink';
import React from 'react';

import { HALF_BLOCK, type ImageCell, type ScreenModel } from '../../../src/render-model.js';

interface PreviewPaneProps {
  preview: ScreenModel['preview'];
}

const ImageRow: React.FC<{ cells: ImageCell[] }> = ({ cells }) => (
  <Text>
    {cells.map((cell, x) => (
      <Text key={x} color={cell.top} backgroundColor={cell.bottom}>
        {HALF_BLOCK}
      </Text>
    ))}
  </Text>
);

export const PreviewPane: React.FC<PreviewPaneProps> = ({ preview }) => {
  const { body } = preview;

  return (
    <Box
      flexDirection="column"
      width={preview.width + 2}
      height={preview.height + 2}
      borderStyle="round"
      borderColor="gray"
      flexGrow={1}
    >
      <Box justifyContent="space-between">
        <Text bold wrap="truncate-end">
          {preview.title}
        </Text>
        {preview.footer && <Text dimColor>{preview.footer}</Text>}
      </Box>
      {body.kind === 'message' && (
        <Text dimColor italic>
          {body.text}
        </Text>
      )}
      {body.kind === 'lines' &&
        body.rows.map((row, i) => (
          <Text key={i} wrap="truncate-end">
            <Text color="gray">{row.gutter}</Text>
            <Text>{row.text}</Text>
          </Text>
        ))}
      {body.kind === 'image' &&
        body.rows.map((cells, y) => <ImageRow key={y} cells={cells} />)}
    </Box>
  );
};
