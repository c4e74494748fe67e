import { createChildLogger } from '../utils/logger.js';
import { getErrorCode } from '../utils/errors.js';
import { buildMetricName, sample, type MetricDescriptor, type MetricRegistry, type MetricSample } from '../utils/metrics.js';
import type { DeviceScraper } from './device-scraper.js';
import type { Credentials, DeviceState } from '../types/modem.js';

const logger = createChildLogger('modem-collector');

const CHANNEL_LABELS = ['channel_id', 'type'] as const;

export interface ModemMetrics {
  up: MetricDescriptor;
  connected: MetricDescriptor;
  uptime: MetricDescriptor;
  info: MetricDescriptor;
  channelLock: MetricDescriptor;
  channelPower: MetricDescriptor;
  channelSnr: MetricDescriptor;
  channelCorrected: MetricDescriptor;
  channelUncorrectable: MetricDescriptor;
  channelInfo: MetricDescriptor;
  scrapeDuration: MetricDescriptor;
}

export function registerModemMetrics(registry: MetricRegistry, namespace: string): ModemMetrics {
  const name = (subsystem: string, metric: string): string => buildMetricName(namespace, subsystem, metric);

  return {
    up: registry.register(name('', 'up'), 'Was the last data scrape successful?', 'gauge'),
    connected: registry.register(name('', 'connected'), "Is the modem's connection up (connectivity state)?", 'gauge'),
    uptime: registry.register(name('', 'uptime_seconds'), 'Uptime', 'gauge'),
    info: registry.register(name('', 'info'), 'Metadata about this modem.', 'gauge', [
      'host',
      'hwversion',
      'swversion',
      'mac',
      'serial',
    ]),
    channelLock: registry.register(name('channel', 'lock'), 'Is the channel locked?', 'gauge', CHANNEL_LABELS),
    channelPower: registry.register(name('channel', 'power'), 'Power level (dBmV)', 'gauge', CHANNEL_LABELS),
    channelSnr: registry.register(name('channel', 'snr'), 'SNR/MER rate (dB)', 'gauge', CHANNEL_LABELS),
    channelCorrected: registry.register(
      name('channel', 'corrected_total'),
      'Corrected errors, counter resets to 0 on modem reboot',
      'counter',
      CHANNEL_LABELS
    ),
    channelUncorrectable: registry.register(
      name('channel', 'uncorrectable_total'),
      'Uncorrectable errors, counter resets to 0 on modem reboot',
      'counter',
      CHANNEL_LABELS
    ),
    channelInfo: registry.register(name('channel', 'info'), 'Channel metadata', 'gauge', [
      'channel_id',
      'modulation',
      'frequency',
      'width',
      'type',
    ]),
    scrapeDuration: registry.register(name('', 'scrape_duration_seconds'), 'Time taken by the last scrape', 'gauge'),
  };
}

export interface CollectorTarget {
  host: string;
  credentials: Credentials;
}

/** Maps one fresh DeviceState per collection onto the registered metrics. */
export class ModemCollector {
  private readonly metrics: ModemMetrics;

  constructor(
    private readonly scraper: DeviceScraper,
    private readonly target: CollectorTarget,
    private readonly registry: MetricRegistry,
    namespace: string
  ) {
    this.metrics = registerModemMetrics(registry, namespace);
  }

  async collect(): Promise<string> {
    const start = Date.now();
    let samples: MetricSample[];

    try {
      const state = await this.scraper.scrape(this.target.host, this.target.credentials);
      samples = [sample(this.metrics.up, 1), ...this.stateSamples(state)];
    } catch (err) {
      logger.error({ host: this.target.host, code: getErrorCode(err), err }, 'Scrape failed');
      samples = [sample(this.metrics.up, 0)];
    }

    samples.push(sample(this.metrics.scrapeDuration, (Date.now() - start) / 1000));
    return this.registry.render(samples);
  }

  stateSamples(state: DeviceState): MetricSample[] {
    const m = this.metrics;
    const samples: MetricSample[] = [
      sample(m.connected, state.connected ? 1 : 0),
      sample(m.uptime, state.uptimeSeconds),
      sample(m.info, 1, {
        host: state.host,
        hwversion: state.hardwareVersion,
        swversion: state.softwareVersion,
        mac: state.macAddress,
        serial: state.serialNumber,
      }),
    ];

    for (const channel of state.downstreamChannels) {
      const labels = { channel_id: channel.channelId, type: 'downstream' };
      samples.push(
        sample(m.channelLock, channel.locked ? 1 : 0, labels),
        sample(m.channelPower, channel.powerDbmV, labels),
        sample(m.channelSnr, channel.snrDb, labels),
        sample(m.channelCorrected, channel.correctedErrors, labels),
        sample(m.channelUncorrectable, channel.uncorrectableErrors, labels),
        sample(m.channelInfo, 1, {
          channel_id: channel.channelId,
          modulation: channel.modulation,
          frequency: channel.frequency,
          width: '',
          type: 'downstream',
        })
      );
    }

    for (const channel of state.upstreamChannels) {
      const labels = { channel_id: channel.channelId, type: 'upstream' };
      samples.push(
        sample(m.channelLock, channel.locked ? 1 : 0, labels),
        sample(m.channelPower, channel.powerDbmV, labels),
        sample(m.channelInfo, 1, {
          channel_id: channel.channelId,
          modulation: channel.channelType,
          frequency: channel.frequency,
          width: channel.width,
          type: 'upstream',
        })
      );
    }

    return samples;
  }
}
