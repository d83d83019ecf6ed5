import { z } from "zod";

const DECIMAL_PATTERN = /^-?(\d+)(?:\.(\d+))?$/;
const DECIMAL_PLACES = 2;

export interface DecimalFieldOptions {
  /** Total significant digits, decimal places included */
  maxDigits: number;
  min?: number;
  max?: number;
}

/**
 * Decimal field with two decimal places, accepted as a JSON number or a numeric string.
 */
export function decimalField({ maxDigits, min = 0, max }: DecimalFieldOptions) {
  return z
    .union([z.number(), z.string().trim()], {
      errorMap: () => ({ message: "A valid number is required" }),
    })
    .transform((raw, ctx) => {
      const text = typeof raw === "number" ? String(raw) : raw;
      const match = DECIMAL_PATTERN.exec(text);
      if (!match) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "A valid number is required" });
        return z.NEVER;
      }

      const wholeDigits = match[1].replace(/^0+/, "").length;
      const places = match[2]?.length ?? 0;
      if (places > DECIMAL_PLACES) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Ensure that there are no more than ${DECIMAL_PLACES} decimal places`,
        });
        return z.NEVER;
      }
      if (wholeDigits > maxDigits - DECIMAL_PLACES) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Ensure that there are no more than ${maxDigits - DECIMAL_PLACES} digits before the decimal point`,
        });
        return z.NEVER;
      }

      const value = Number(text);
      if (value < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Ensure this value is greater than or equal to ${min}` });
        return z.NEVER;
      }
      if (max !== undefined && value > max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Ensure this value is less than or equal to ${max}` });
        return z.NEVER;
      }
      return value;
    });
}

/**
 * Percentage between 0 and 100 with two decimal places
 */
export function percentageField() {
  return decimalField({ maxDigits: 5, max: 100 });
}

export function toHundredths(value: number): number {
  return Math.round(value * 100);
}

export function fromHundredths(value: number): number {
  return value / 100;
}
