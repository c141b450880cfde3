/**
 * Main Ink App component for routing commands.
 */

import React from 'react';
import { Text, Box } from 'ink';
import type { AppProps } from '../types.js';
import IngestCommand from './IngestCommand.js';
import QueryCommand from './QueryCommand.js';

const App: React.FC<AppProps> = ({ command, args, flags }) => {
  // No command provided, show help
  if (!command) {
    return (
      <Box flexDirection="column">
        <Text bold>logsift - multi-line log ingestion and time-window queries</Text>
        <Text> </Text>
        <Text bold>Usage:</Text>
        <Text>  $ logsift-ui &lt;command&gt; [options]</Text>
        <Text> </Text>
        <Text bold>Commands:</Text>
        <Text>  ingest               Segment *.log files into the database</Text>
        <Text>  query &lt;timestamp&gt;    Show entries around a timestamp</Text>
        <Text> </Text>
        <Text bold>Examples:</Text>
        <Text>  $ logsift-ui ingest --date 2023-10-15 --directory ./logs</Text>
        <Text>  $ logsift-ui query 1697381136 --range 30 --filter "!debug"</Text>
      </Box>
    );
  }

  // Route to appropriate command
  switch (command) {
    case 'ingest':
      return <IngestCommand flags={flags} />;
    case 'query':
      return <QueryCommand args={args} flags={flags} />;
    default:
      return (
        <Box>
          <Text color="red">Unknown command: {command}</Text>
        </Box>
      );
  }
};

export default App;
