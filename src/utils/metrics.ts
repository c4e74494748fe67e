export type MetricType = 'gauge' | 'counter';

export interface MetricDescriptor {
  readonly name: string;
  readonly help: string;
  readonly type: MetricType;
  readonly labelNames: readonly string[];
}

export interface MetricSample {
  readonly descriptor: MetricDescriptor;
  readonly value: number;
  readonly labels: Readonly<Record<string, string>>;
}

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function buildMetricName(namespace: string, subsystem: string, name: string): string {
  return [namespace, subsystem, name].filter((part) => part !== '').join('_');
}

/**
 * Descriptors are registered once at startup; each collection builds fresh
 * samples against them, so nothing from a previous scrape is re-exported.
 */
export class MetricRegistry {
  private readonly descriptors = new Map<string, MetricDescriptor>();

  register(name: string, help: string, type: MetricType, labelNames: readonly string[] = []): MetricDescriptor {
    if (!METRIC_NAME.test(name)) {
      throw new Error(`Invalid metric name: ${name}`);
    }
    const badLabel = labelNames.find((label) => !LABEL_NAME.test(label));
    if (badLabel !== undefined) {
      throw new Error(`Invalid label name "${badLabel}" for metric ${name}`);
    }
    if (this.descriptors.has(name)) {
      throw new Error(`Metric already registered: ${name}`);
    }

    const descriptor: MetricDescriptor = Object.freeze({ name, help, type, labelNames: [...labelNames] });
    this.descriptors.set(name, descriptor);
    return descriptor;
  }

  describe(): MetricDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  /** Prometheus text exposition, one HELP/TYPE block per descriptor that has samples. */
  render(samples: readonly MetricSample[]): string {
    const lines: string[] = [];

    for (const descriptor of this.descriptors.values()) {
      const own = samples.filter((s) => s.descriptor === descriptor);
      if (own.length === 0) continue;

      lines.push(`# HELP ${descriptor.name} ${escapeHelp(descriptor.help)}`);
      lines.push(`# TYPE ${descriptor.name} ${descriptor.type}`);
      for (const s of own) {
        lines.push(`${descriptor.name}${formatLabels(descriptor, s.labels)} ${formatValue(s.value)}`);
      }
    }

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }
}

export function sample(
  descriptor: MetricDescriptor,
  value: number,
  labels: Record<string, string> = {}
): MetricSample {
  const given = Object.keys(labels);
  const matches =
    given.length === descriptor.labelNames.length && descriptor.labelNames.every((name) => name in labels);
  if (!matches) {
    throw new Error(
      `Labels [${given.join(', ')}] do not match [${descriptor.labelNames.join(', ')}] for ${descriptor.name}`
    );
  }
  return { descriptor, value, labels };
}

function formatLabels(descriptor: MetricDescriptor, labels: Readonly<Record<string, string>>): string {
  if (descriptor.labelNames.length === 0) return '';
  const pairs = descriptor.labelNames.map((name) => `${name}="${escapeLabelValue(labels[name] ?? '')}"`);
  return `{${pairs.join(',')}}`;
}

export function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return String(value);
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapeHelp(help: string): string {
  return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}
