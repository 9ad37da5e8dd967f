import { z } from 'zod';
import { isAddress } from 'viem';

const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), 'must be a 0x-prefixed 20-byte hex address');

const amountSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, 'must be a non-negative integer string')
  .transform((value) => BigInt(value));

const priceTierSchema = z.object({
  length: z.number().int().positive(),
  price: amountSchema,
});

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Storage
  dbPath: z.string().min(1).default('./data/registry.db'),

  // Registration
  registrationPeriodSeconds: z.number().int().positive().default(31_536_000),

  // Factory
  factoryAddress: addressSchema.optional(),
  factoryAdmin: addressSchema,
  feeReceiver: addressSchema,
  namespaceFee: amountSchema.default('10000000000000000'),
  defaultPriceTiers: z.array(priceTierSchema).default([
    { length: 3, price: '50000000000000000' },
    { length: 4, price: '20000000000000000' },
    { length: 5, price: '5000000000000000' },
  ]),

  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Parse price tiers from env if provided (JSON array)
  let defaultPriceTiers: unknown;
  if (env['DEFAULT_PRICE_TIERS']) {
    try {
      defaultPriceTiers = JSON.parse(env['DEFAULT_PRICE_TIERS']);
    } catch {
      throw new Error('Configuration validation failed:\ndefaultPriceTiers: DEFAULT_PRICE_TIERS is not valid JSON');
    }
  }

  const raw = {
    dbPath: env['REGISTRY_DB_PATH'] || undefined,
    registrationPeriodSeconds: env['REGISTRATION_PERIOD_SECONDS']
      ? parseInt(env['REGISTRATION_PERIOD_SECONDS'], 10)
      : undefined,
    factoryAddress: env['FACTORY_ADDRESS'] || undefined,
    factoryAdmin: env['FACTORY_ADMIN'],
    feeReceiver: env['FEE_RECEIVER'],
    namespaceFee: env['NAMESPACE_FEE'] || undefined,
    defaultPriceTiers,
    nodeEnv: env['NODE_ENV'] || undefined,
    logLevel: env['LOG_LEVEL'] || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}
