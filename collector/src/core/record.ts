import { z } from "zod";
import { Price, RawRecord } from "./dto";

const propertyCodeSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .refine((value) => value.length > 0);

const priceSchema = z
  .union([
    z.number(),
    z
      .string()
      .regex(/^\d+(\.\d+)?$/)
      .transform(Number),
  ])
  .refine((value) => value !== 0);

export interface ExtractedRecord {
  propertyCode: string;
  price: Price;
}

/**
 * Pull the identifying code and price out of a raw search record.
 * Returns null when either is missing or falsy.
 */
export function extractRecord(raw: RawRecord): ExtractedRecord | null {
  const code = propertyCodeSchema.safeParse(raw.propertyCode);
  const price = priceSchema.safeParse(raw.price);

  if (!code.success || !price.success) {
    return null;
  }

  return { propertyCode: code.data, price: price.data };
}
