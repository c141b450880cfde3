/**
 * QueryCommand Ink component for the query command UI.
 */

import React, { useEffect, useState } from 'react';
import { Text, Box } from 'ink';
import Spinner from 'ink-spinner';
import { describeError, QueryError } from '../errors.js';
import { formatHeader, formatRow } from '../format.js';
import { executeQuery, splitFieldList, type QueryOutcome } from '../query.js';
import { formatDisplayTimestamp } from '../timestamp.js';
import type { UiFlags } from '../types.js';

interface QueryCommandProps {
  args: string[];
  flags: UiFlags;
}

const QueryCommand: React.FC<QueryCommandProps> = ({ args, flags }) => {
  const [status, setStatus] = useState<'validating' | 'processing' | 'success' | 'error'>('validating');
  const [error, setError] = useState<string | null>(null);
  const [outcome, setOutcome] = useState<QueryOutcome | null>(null);

  useEffect(() => {
    const run = async () => {
      try {
        // Validate required arguments
        const timestamp = args[0];
        if (timestamp === undefined) {
          throw QueryError.missingTimestamp();
        }

        setStatus('processing');

        const result = executeQuery({
          timestamp,
          database: flags.database,
          rangeSeconds: flags.range,
          filters: flags.filter,
          fields: flags.fields === undefined ? undefined : splitFieldList(flags.fields),
          withTime: flags.withtime,
          limit: flags.limit,
        });
        setOutcome(result);
        setStatus('success');
      } catch (err: unknown) {
        setError(describeError(err));
        setStatus('error');
      }
    };

    void run();
  }, [args, flags]);

  if (status === 'error') {
    return (
      <Box flexDirection="column">
        <Text color="red" bold>Error:</Text>
        <Text color="red">{error}</Text>
      </Box>
    );
  }

  if (status !== 'success' || outcome === null) {
    return (
      <Box>
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
        <Text> {status === 'validating' ? 'Validating...' : 'Querying logs...'}</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      <Text>
        Querying logs from {formatDisplayTimestamp(outcome.range.from)} to{' '}
        {formatDisplayTimestamp(outcome.range.to)} (UTC)
      </Text>
      {outcome.entries.length === 0 ? (
        <Text color="yellow">No matching log entries found. Try widening the time window with --range.</Text>
      ) : (
        <Box flexDirection="column">
          <Text color="green">Found {outcome.entries.length} matching entries:</Text>
          <Text bold>{formatHeader(outcome.fields)}</Text>
          {outcome.entries.map((entry) => (
            <Text key={entry.id}>{formatRow(entry, outcome.fields)}</Text>
          ))}
        </Box>
      )}
    </Box>
  );
};

export default QueryCommand;
