import { z } from 'zod';

/** 1-based column position, matching `td:nth-child(n)`. */
const ColumnSchema = z.number().int().min(1);

export const UnitColumnSchema = z.object({
  column: ColumnSchema,
  unit: z.string().describe('Exact suffix stripped before parsing, e.g. " dBmV"'),
});
export type UnitColumn = z.infer<typeof UnitColumnSchema>;

const TableLocatorSchema = z.object({
  anchorText: z.string().describe('Text of the first row that names the table'),
  fallbackIndex: z.number().int().min(0).describe('Index among all <table> elements on the page'),
  headerLabels: z.array(z.string()).min(1),
  lockedText: z.string(),
});

export const DownstreamTableShapeSchema = TableLocatorSchema.extend({
  columns: z.object({
    channelId: ColumnSchema,
    lockStatus: ColumnSchema,
    modulation: ColumnSchema,
    frequency: ColumnSchema,
    power: UnitColumnSchema,
    snr: UnitColumnSchema,
    correctedErrors: UnitColumnSchema,
    uncorrectableErrors: UnitColumnSchema,
  }),
});
export type DownstreamTableShape = z.infer<typeof DownstreamTableShapeSchema>;

export const UpstreamTableShapeSchema = TableLocatorSchema.extend({
  columns: z.object({
    channel: ColumnSchema,
    channelId: ColumnSchema,
    lockStatus: ColumnSchema,
    channelType: ColumnSchema,
    frequency: ColumnSchema,
    width: ColumnSchema,
    power: UnitColumnSchema,
  }),
});
export type UpstreamTableShape = z.infer<typeof UpstreamTableShapeSchema>;

export const ModemModelProfileSchema = z.object({
  model: z.string(),
  auth: z.object({
    logoutPath: z.string(),
    loginPath: z.string(),
    sessionCookieName: z.string(),
  }),
  statusPage: z.object({
    path: z.string(),
    connectivitySelector: z.string(),
    connectedText: z.string(),
    downstream: DownstreamTableShapeSchema,
    upstream: UpstreamTableShapeSchema,
  }),
  infoPage: z.object({
    path: z.string(),
    hardwareVersionSelector: z.string(),
    softwareVersionSelector: z.string(),
    macAddressSelector: z.string(),
    serialNumberSelector: z.string(),
    uptimeSelector: z.string(),
  }),
});
export type ModemModelProfile = z.infer<typeof ModemModelProfileSchema>;

const SB8200_INFO_ROW = (row: number): string =>
  `table.simpleTable:nth-child(2) > tbody:nth-child(1) > tr:nth-child(${row}) > td:nth-child(2)`;

export const MODEM_MODEL_NAMES = ['sb8200'] as const;
export type ModemModel = (typeof MODEM_MODEL_NAMES)[number];

export const MODEM_MODELS: Record<ModemModel, ModemModelProfile> = {
  sb8200: {
    model: 'SB8200',
    auth: {
      logoutPath: '/logout.html',
      loginPath: '/cmconnectionstatus.html',
      sessionCookieName: 'sessionId',
    },
    statusPage: {
      path: '/cmconnectionstatus.html',
      connectivitySelector:
        '.content > center:nth-child(2) > table:nth-child(1) > tbody:nth-child(1) > tr:nth-child(4) > td:nth-child(2)',
      connectedText: 'OK',
      downstream: {
        anchorText: 'Downstream Bonded Channels',
        fallbackIndex: 1,
        headerLabels: ['Channel ID'],
        lockedText: 'Locked',
        columns: {
          channelId: 1,
          lockStatus: 2,
          modulation: 3,
          frequency: 4,
          power: { column: 5, unit: ' dBmV' },
          snr: { column: 6, unit: ' dB' },
          correctedErrors: { column: 7, unit: '' },
          uncorrectableErrors: { column: 8, unit: '' },
        },
      },
      upstream: {
        anchorText: 'Upstream Bonded Channels',
        fallbackIndex: 2,
        // The second header row has an empty first cell
        headerLabels: ['Channel', ''],
        lockedText: 'Locked',
        columns: {
          channel: 1,
          channelId: 2,
          lockStatus: 3,
          channelType: 4,
          frequency: 5,
          width: 6,
          power: { column: 7, unit: ' dBmV' },
        },
      },
    },
    infoPage: {
      path: '/cmswinfo.html',
      hardwareVersionSelector: SB8200_INFO_ROW(3),
      softwareVersionSelector: SB8200_INFO_ROW(4),
      macAddressSelector: SB8200_INFO_ROW(5),
      serialNumberSelector: SB8200_INFO_ROW(6),
      uptimeSelector:
        'table.simpleTable:nth-child(5) > tbody:nth-child(1) > tr:nth-child(2) > td:nth-child(2)',
    },
  },
};
