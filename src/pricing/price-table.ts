/**
 * Static machine-type price table
 */

import { readFile } from 'fs/promises';
import { isAbsolute, join, resolve } from 'path';
import { z } from 'zod';
import { ErrorCode, PricingError, toError } from '../errors/index.js';
import { roundCurrency, roundTo } from '../utils/units.js';
import type { MachineOffer, PriceTableMetadata } from '../types/pricing.js';

export const BUNDLED_PRICE_TABLE_PATH = join(__dirname, '..', '..', 'data', 'price-table.json');

const MachineOfferDataSchema = z.object({
  name: z.string().min(1),
  family: z.string().min(1),
  vcpus: z.number().positive(),
  memoryGB: z.number().positive(),
  hourlyPrice: z.number().nonnegative(),
  monthlyPrice: z.number().nonnegative(),
});

export const PriceTableDataSchema = z
  .object({
    metadata: z.object({
      provider: z.string().min(1),
      region: z.string().min(1),
      version: z.string().min(1),
      currency: z.string().min(1).default('USD'),
      source: z.string().optional(),
      discountRate: z.number().min(0).lt(1),
    }),
    offers: z.array(MachineOfferDataSchema).min(1),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.offers.forEach((offer, index) => {
      if (seen.has(offer.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['offers', index, 'name'],
          message: `Duplicate machine type '${offer.name}'`,
        });
      }
      seen.add(offer.name);
    });
  });

export type PriceTableData = z.input<typeof PriceTableDataSchema>;

/**
 * Immutable, versioned collection of machine offers.
 * Discounted prices are derived from the metadata discount rate.
 */
export class PriceTable {
  readonly metadata: PriceTableMetadata;
  private readonly offers: readonly MachineOffer[];
  private readonly byName: ReadonlyMap<string, MachineOffer>;

  private constructor(metadata: PriceTableMetadata, offers: MachineOffer[]) {
    this.metadata = Object.freeze(metadata);
    this.offers = Object.freeze(offers.map(offer => Object.freeze(offer)));
    this.byName = new Map(this.offers.map(offer => [offer.name, offer]));
  }

  /**
   * Build a table from raw data, validating it first
   */
  static fromData(data: unknown, overrides: { region?: string } = {}): PriceTable {
    const result = PriceTableDataSchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new PricingError(`Invalid price table: ${issues.join('; ')}`, ErrorCode.PRICE_TABLE_INVALID, { issues });
    }

    const { metadata, offers } = result.data;
    const keep = 1 - metadata.discountRate;
    return new PriceTable(
      { ...metadata, region: overrides.region ?? metadata.region },
      offers.map(offer => ({
        ...offer,
        discountedHourlyPrice: roundTo(offer.hourlyPrice * keep, 4),
        discountedMonthlyPrice: roundCurrency(offer.monthlyPrice * keep),
      }))
    );
  }

  list(): readonly MachineOffer[] {
    return this.offers;
  }

  get size(): number {
    return this.offers.length;
  }

  get(name: string): MachineOffer | undefined {
    return this.byName.get(name);
  }

  /**
   * Look up an offer, failing on unknown machine types
   */
  require(name: string): MachineOffer {
    const offer = this.byName.get(name);
    if (!offer) {
      throw new PricingError(`Unknown machine type: ${name}`, ErrorCode.UNKNOWN_MACHINE_TYPE, {
        machineType: name,
        available: this.offers.length,
      });
    }
    return offer;
  }
}

/**
 * Load a price table from a JSON file; defaults to the bundled table
 */
export async function loadPriceTable(path?: string, overrides: { region?: string } = {}): Promise<PriceTable> {
  const file = path ? (isAbsolute(path) ? path : resolve(process.cwd(), path)) : BUNDLED_PRICE_TABLE_PATH;

  let data: unknown;
  try {
    data = JSON.parse(await readFile(file, 'utf-8'));
  } catch (error) {
    const cause = toError(error);
    throw new PricingError(
      `Failed to load price table ${file}: ${cause.message}`,
      ErrorCode.PRICE_TABLE_INVALID,
      { path: file },
      cause
    );
  }

  return PriceTable.fromData(data, overrides);
}

export interface PricingInformation {
  metadata: PriceTableMetadata;
  offers: readonly MachineOffer[];
}

/**
 * Table metadata with every offer, or a single offer by machine type
 */
export function getPricingInformation(table: PriceTable, machineType?: string): PricingInformation | MachineOffer {
  if (machineType !== undefined) {
    return table.require(machineType);
  }
  return { metadata: table.metadata, offers: table.list() };
}
