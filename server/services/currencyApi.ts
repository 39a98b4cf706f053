/**
 * Currency conversion (exchangerate.host) and price formatting.
 */

import { z } from 'zod';
import { ValidationError, resilient } from '../engine';
import { fetchJson, type ClientOptions } from './httpClient';

const CONVERT_URL = 'https://api.exchangerate.host/convert';
const CURRENCY_CODE = /^[A-Z]{3}$/;

export const CURRENCY_SYMBOLS: Readonly<Record<string, string>> = {
  EUR: '€',
  USD: '$',
  IDR: 'Rp',
  GBP: '£',
};

export interface Conversion {
  amount: number;
  from: string;
  to: string;
  result: number;
}

const convertSchema = z.object({ result: z.number().nullable().optional() });

const round2 = (value: number) => Math.round(value * 100) / 100;

function normalizeCurrency(code: string): string {
  const upper = code.trim().toUpperCase();
  if (!CURRENCY_CODE.test(upper)) {
    throw new ValidationError(`Invalid currency code "${code}"`);
  }
  return upper;
}

/**
 * "€1,234.50". Unknown currencies use the code as the symbol; a value that is
 * not a number is appended as given.
 */
export function formatPrice(amount: number | string, currency = 'EUR'): string {
  const code = currency.toUpperCase();
  const symbol = CURRENCY_SYMBOLS[code] ?? code;
  const value = typeof amount === 'number' ? amount : Number(amount);
  if (typeof amount === 'string' && amount.trim() === '') return `${symbol}${amount}`;
  if (!Number.isFinite(value)) return `${symbol}${amount}`;
  return `${symbol}${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

export function createCurrencyClient(options: ClientOptions = {}) {
  const { cache = null, policy, timeoutMs } = options;

  const convertCurrency = resilient('currency.convert', { cache, policy })(
    async (amount: number, to: string = 'USD', from: string = 'EUR'): Promise<Conversion> => {
      if (!Number.isFinite(amount)) throw new ValidationError('amount must be a finite number');
      const target = normalizeCurrency(to);
      const source = normalizeCurrency(from);

      const data = await fetchJson(CONVERT_URL, convertSchema, {
        params: { from: source, to: target, amount, access_key: options.apiKey },
        timeoutMs,
        source: 'Currency',
      });

      return { amount, from: source, to: target, result: round2(data.result ?? 0) };
    }
  );

  return { convertCurrency };
}

export type CurrencyClient = ReturnType<typeof createCurrencyClient>;
