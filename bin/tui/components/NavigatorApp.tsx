import { Box, Text, useApp, useInput } from 'ink';
import React, { useEffect } from 'react';

import { useNavigator } from '../../../src/hooks/useNavigator.js';
import { useTerminalSize } from '../../../src/hooks/useTerminalSize.js';
import { toNavigatorKeys } from '../../../src/key-bindings.js';
import type { Navigator } from '../../../src/navigator.js';
import type { NavigatorMode } from '../../../src/types.js';
import { projectScreen } from '../../../src/render-model.js';
import { FileList } from './FileList.js';
import { PreviewPane } from './PreviewPane.js';
import { StatusBar } from './StatusBar.js';

interface NavigatorAppProps {
  navigator: Navigator;
}

const MODE_COLOR: Record<NavigatorMode, string> = {
  browsing: 'green',
  searching: 'yellow',
  history: 'magenta'
};

export const NavigatorApp: React.FC<NavigatorAppProps> = ({ navigator }) => {
  const { exit } = useApp();
  const [snapshot, dispatch] = useNavigator(navigator);
  const viewport = useTerminalSize();

  useInput((input, key) => {
    for (const navigatorKey of toNavigatorKeys(input, key)) {
      dispatch(navigatorKey);
    }
  });

  // Leave the render loop once the session has an outcome
  useEffect(() => {
    if (snapshot.outcome) {
      exit();
    }
  }, [snapshot.outcome, exit]);

  const screen = projectScreen(snapshot, viewport);

  return (
    <Box flexDirection="column" height={viewport.rows}>
      <Box paddingX={1}>
        <Text backgroundColor={MODE_COLOR[snapshot.mode]} color="black" bold>
          {` ${screen.header.badge} `}
        </Text>
        <Text> </Text>
        <Text bold wrap="truncate-start">
          {screen.header.directory}
        </Text>
        <Text dimColor>{`  ${screen.list.position}`}</Text>
      </Box>
      <Box flexDirection="row">
        <FileList list={screen.list} accent={MODE_COLOR[snapshot.mode]} />
        <PreviewPane preview={screen.preview} />
      </Box>
      <StatusBar text={screen.statusLine} searching={snapshot.mode === 'searching'} />
    </Box>
  );
};
