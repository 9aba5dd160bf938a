/**
 * Probe configuration schema
 *
 * Non-secret settings read from the JSON config file. Credentials come from the
 * environment and are validated separately.
 */

import { z } from 'zod';

export const OrderSideSchema = z.enum(['buy', 'sell']);

export const ProbeConfigSchema = z.object({
  testnet: z.boolean().default(true),
  side: OrderSideSchema,
  instrumentName: z.string().min(1),
  orderAmount: z.number().positive(),
  /** Fallback reference price when the ticker cannot be read. */
  basePrice: z.number().positive(),
  /** Distance from the reference price for the opening quote, in percent. */
  priceOffsetPercent: z.number().min(0).max(100),
  /** Extra distance applied on edit, in percent. */
  editOffsetStepPercent: z.number().min(0).max(100),
  numIterations: z.number().int().min(0),
  sleepBetweenRequestsSecs: z.number().min(0),
  outputLatencyCsv: z.string().min(1),
  subscribeRawBook: z.boolean().default(true),
  printSummary: z.boolean().default(true),
});

export const CredentialsSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
});

export type ProbeConfig = Readonly<z.infer<typeof ProbeConfigSchema>>;
export type Credentials = Readonly<z.infer<typeof CredentialsSchema>>;
