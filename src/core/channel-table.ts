import { ZodError, type ZodType } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import { RowParseError } from '../utils/errors.js';
import { cellAt, readCells } from '../utils/html.js';
import { classifyRow } from './row-classifier.js';
import { parseUnitValue } from './unit-value.js';
import {
  DownstreamChannelSchema,
  UpstreamChannelSchema,
  type ChannelDirection,
  type DownstreamChannel,
  type UpstreamChannel,
} from '../types/modem.js';
import type { DownstreamTableShape, UpstreamTableShape } from '../types/modem-models.js';

const logger = createChildLogger('channel-table');

type RowParser<T> = (cells: readonly string[]) => T;

function parseTable<T>(
  direction: ChannelDirection,
  rows: readonly Element[],
  headerLabels: readonly string[],
  parseRow: RowParser<T>
): T[] {
  const channels: T[] = [];

  rows.forEach((row, index) => {
    const cells = readCells(row);

    if (classifyRow(cells, headerLabels) === 'header') {
      logger.debug({ direction, index, label: cells[0] ?? '' }, 'Skipping header row');
      return;
    }

    try {
      channels.push(parseRow(cells));
    } catch (err) {
      if (!(err instanceof RowParseError)) throw err;
      logger.debug({ direction, index, cells, err }, 'Dropping unparsable channel row');
    }
  });

  return channels;
}

function validated<T>(schema: ZodType<T>, record: unknown): Readonly<T> {
  try {
    return Object.freeze(schema.parse(record));
  } catch (err) {
    if (err instanceof ZodError) {
      throw new RowParseError(`Invalid channel record: ${err.issues.map((i) => i.message).join('; ')}`, {
        cause: err,
        context: { record },
      });
    }
    throw err;
  }
}

export function parseDownstreamRow(cells: readonly string[], shape: DownstreamTableShape): DownstreamChannel {
  const { columns } = shape;
  const unitValue = (col: { column: number; unit: string }): number =>
    parseUnitValue(cellAt(cells, col.column), col.unit);

  return validated(DownstreamChannelSchema, {
    channelId: cellAt(cells, columns.channelId),
    locked: cellAt(cells, columns.lockStatus) === shape.lockedText,
    modulation: cellAt(cells, columns.modulation),
    frequency: cellAt(cells, columns.frequency),
    powerDbmV: unitValue(columns.power),
    snrDb: unitValue(columns.snr),
    correctedErrors: unitValue(columns.correctedErrors),
    uncorrectableErrors: unitValue(columns.uncorrectableErrors),
  });
}

export function parseUpstreamRow(cells: readonly string[], shape: UpstreamTableShape): UpstreamChannel {
  const { columns } = shape;

  return validated(UpstreamChannelSchema, {
    channel: cellAt(cells, columns.channel),
    channelId: cellAt(cells, columns.channelId),
    locked: cellAt(cells, columns.lockStatus) === shape.lockedText,
    channelType: cellAt(cells, columns.channelType),
    frequency: cellAt(cells, columns.frequency),
    width: cellAt(cells, columns.width),
    powerDbmV: parseUnitValue(cellAt(cells, columns.power.column), columns.power.unit),
  });
}

/** Parse downstream rows in page order, skipping headers and dropping bad rows. */
export function parseDownstreamTable(rows: readonly Element[], shape: DownstreamTableShape): DownstreamChannel[] {
  return parseTable('downstream', rows, shape.headerLabels, (cells) => parseDownstreamRow(cells, shape));
}

export function parseUpstreamTable(rows: readonly Element[], shape: UpstreamTableShape): UpstreamChannel[] {
  return parseTable('upstream', rows, shape.headerLabels, (cells) => parseUpstreamRow(cells, shape));
}
