import { z } from 'zod';
import { isAccount } from './accounts';

/** Decimal string of an unsigned integer, parsed to bigint */
export const uint = z
  .string()
  .regex(/^\d+$/, { message: 'Expected an unsigned integer string' })
  .transform((value) => BigInt(value));

export const account = z.string().refine(isAccount, { message: 'Expected a base58 public key' });
