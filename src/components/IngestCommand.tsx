/**
 * IngestCommand Ink component for the ingest command UI.
 */

import React, { useEffect, useState } from 'react';
import { Text, Box } from 'ink';
import Spinner from 'ink-spinner';
import { describeError } from '../errors.js';
import { executeIngest, type IngestCommandOutcome, type IngestEvent } from '../ingest.js';
import { describeIngestEvent, type ProgressLevel } from '../progress.js';
import { formatCalendarDate, todayUtc } from '../timestamp.js';
import type { UiFlags } from '../types.js';
import { validateDate } from '../utils/validation.js';

interface IngestCommandProps {
  flags: UiFlags;
}

const LEVEL_COLORS: Record<ProgressLevel, string | undefined> = {
  info: undefined,
  success: 'green',
  warning: 'yellow',
  error: 'red',
};

const IngestCommand: React.FC<IngestCommandProps> = ({ flags }) => {
  const [status, setStatus] = useState<'validating' | 'processing' | 'success' | 'error'>('validating');
  const [error, setError] = useState<string | null>(null);
  const [events, setEvents] = useState<IngestEvent[]>([]);
  const [outcome, setOutcome] = useState<IngestCommandOutcome | null>(null);
  const [dateLabel, setDateLabel] = useState<string>('');

  useEffect(() => {
    const run = async () => {
      try {
        const date = flags.date === undefined ? todayUtc() : validateDate(flags.date);
        setDateLabel(formatCalendarDate(date));

        setStatus('processing');

        const result = await executeIngest(
          { directory: flags.directory, database: flags.database, date, pattern: flags.pattern },
          (event) => setEvents((previous) => [...previous, event])
        );
        setOutcome(result);
        setStatus('success');
      } catch (err: unknown) {
        setError(describeError(err));
        setStatus('error');
      }
    };

    void run();
  }, [flags]);

  if (status === 'error') {
    return (
      <Box flexDirection="column">
        <Text color="red" bold>Error:</Text>
        <Text color="red">{error}</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      {dateLabel !== '' && <Text>Using reference date: {dateLabel}</Text>}
      {events.flatMap(describeIngestEvent).map((line, index) => (
        <Text key={index} color={LEVEL_COLORS[line.level]}>
          {line.text}
        </Text>
      ))}
      {status === 'success' && outcome !== null ? (
        outcome.discovered.length === 0 ? (
          <Text color="yellow">No {flags.pattern} files found in the specified directory.</Text>
        ) : (
          <Text color="green">
            Completed! Processed {outcome.totalEntries} total log entries into {flags.database}
          </Text>
        )
      ) : (
        <Box>
          <Text color="cyan">
            <Spinner type="dots" />
          </Text>
          <Text> {status === 'validating' ? 'Validating...' : 'Ingesting log files...'}</Text>
        </Box>
      )}
    </Box>
  );
};

export default IngestCommand;
