import type { BrandRecord, BrandRecordInput, CampaignParameters } from '../../src/types/index.js';
import { brandRecordSchema } from '../../src/types/index.js';
import type { RandomSource } from '../../src/content/RandomSource.js';
import type { ILogger, LogEntry } from '../../src/utils/Logger.js';
import { createLogger } from '../../src/utils/Logger.js';

export const brandInput: BrandRecordInput = {
  name: 'Northwind Labs',
  tagline: 'Plans that keep pace',
  description: 'Northwind Labs builds planning software.',
  website: 'https://northwind.example',
  colors: { primary: '#1A73E8', secondary: '#FF7043', background: '#FFFFFF', text: '#222222' },
  typography: { heading: 'Poppins', body: 'Lato' },
  keywords: ['Scheduling', 'Reporting', 'Menu', 'AI', 'Search', 'Integrations', 'Analytics', 'Forecasting'],
  testimonials: [
    { quote: 'We ship plans in half the time.', author: 'Dana Reyes', role: 'COO', company: 'Bright Co' },
    { quote: 'Our team finally sees the whole week.', author: 'Sam Okafor' },
    { quote: 'Setup took an afternoon.', author: 'Lee Park' },
  ],
};

export const brand: BrandRecord = brandRecordSchema.parse(brandInput);

export const campaign: CampaignParameters = {
  what: 'A Scheduling Tool',
  why: 'Fewer missed handoffs',
  who: 'small teams',
};

/**
 * Always returns the same value, pinning every pick to one variant.
 */
export function constantRandom(value = 0): RandomSource {
  return { next: () => value };
}

/**
 * Logger that records entries instead of printing them.
 */
export function captureLogger(): { logger: ILogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger('debug', 'Test', { sink: entry => entries.push(entry) });
  return { logger, entries };
}

export const silentLogger: ILogger = createLogger('silent');
