import { z } from "zod";

/**
 * Finite number, numeric strings accepted (quote feeds often send text).
 */
const price = () => z.coerce.number().finite();

/**
 * Identity part of every quote variant. Parsed separately from the price
 * fields so a quote without prices still reports who it belongs to.
 *
 * @example
 * ```typescript
 * const identity = AssetIdentitySchema.safeParse({
 *   source: "fund",
 *   quote: { fundcode: "000001", name: "Growth Fund" },
 * });
 * ```
 */
export const AssetIdentitySchema = z.discriminatedUnion("source", [
  z.object({
    source: z.literal("crypto"),
    quote: z.object({ symbol: z.string(), name: z.string().optional() }),
  }),
  z.object({
    source: z.literal("equity"),
    quote: z.object({ code: z.string(), name: z.string().optional() }),
  }),
  z.object({
    source: z.literal("fund"),
    quote: z.object({ fundcode: z.string(), name: z.string().optional() }),
  }),
]);

/**
 * A non-empty caller-supplied history. Elements are checked one by one with
 * PriceBarSchema, so a single malformed bar does not discard the series, and
 * the quote prices are not required once history is present.
 */
export const AssetHistorySchema = z.object({
  history: z.array(z.unknown()).nonempty(),
});

/**
 * Quote of each variant with the price fields needed to build a bar.
 */
export const AssetSchema = z.discriminatedUnion("source", [
  z.object({
    source: z.literal("crypto"),
    quote: z.object({
      symbol: z.string(),
      name: z.string().optional(),
      current_price: price(),
      high_24h: price().optional(),
      low_24h: price().optional(),
      total_volume: price().optional(),
    }),
  }),
  z.object({
    source: z.literal("equity"),
    quote: z.object({
      code: z.string(),
      name: z.string().optional(),
      close: price(),
      open: price().optional(),
      high: price().optional(),
      low: price().optional(),
      volume: price().optional(),
    }),
  }),
  z.object({
    source: z.literal("fund"),
    quote: z.object({
      fundcode: z.string(),
      name: z.string().optional(),
      nav: price(),
    }),
  }),
]);

/**
 * Single bar of a caller-supplied history.
 */
export const PriceBarSchema = z.object({
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite().nonnegative(),
  timestamp: z.union([z.number(), z.string()]).optional(),
});

export type TAssetSchema = z.infer<typeof AssetSchema>;
export type TAssetIdentitySchema = z.infer<typeof AssetIdentitySchema>;

export default AssetSchema;
