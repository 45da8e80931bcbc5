import { envFlag } from './env';

export type TraceChannel = 'cpu' | 'timers' | 'keys' | 'rom';
export type TraceOptions = Partial<Record<TraceChannel, boolean>>;

const CHANNELS: readonly TraceChannel[] = ['cpu', 'timers', 'keys', 'rom'];

const ENV_FLAGS: Record<TraceChannel, string> = {
  cpu: 'TRACE_CPU',
  timers: 'TRACE_TIMERS',
  keys: 'TRACE_KEYS',
  rom: 'TRACE_ROM',
};

export type Tracer = (channel: TraceChannel, message: () => string) => void;

// Resolve enabled channels once: explicit options win over TRACE_* env flags
export function createTracer(opts: TraceOptions = {}): Tracer {
  const enabled = new Set<TraceChannel>();
  for (const ch of CHANNELS) {
    if (opts[ch] ?? envFlag(ENV_FLAGS[ch])) enabled.add(ch);
  }
  return (channel, message) => {
    if (!enabled.has(channel)) return;
    // eslint-disable-next-line no-console
    console.log(`[${channel}] ${message()}`);
  };
}
