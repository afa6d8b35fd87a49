import { z } from "zod";
import type { FieldType, FieldValue } from "../shared/record.js";

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;
const TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

const TRUE_WORDS = new Set(["true", "t", "yes", "y", "1"]);
const FALSE_WORDS = new Set(["false", "f", "no", "n", "0"]);

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

type ParsedTimestamp = { date: string; epochMs: number };

// Accepted: YYYY-MM-DD, YYYY-MM-DD[T ]HH:mm[:ss[.fff]][Z|±HH:MM]. No zone means UTC.
export const parseTimestamp = (input: string): ParsedTimestamp | null => {
  const match = TIMESTAMP.exec(input);
  if (!match) return null;
  const [, y, mo, d, h = "0", mi = "0", s = "0", fraction = "", zone = "Z"] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(fraction.padEnd(3, "0").slice(0, 3));

  const local = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Reject rollovers such as 2024-02-30 or 25:00
  if (
    local.getUTCFullYear() !== year ||
    local.getUTCMonth() !== month - 1 ||
    local.getUTCDate() !== day ||
    local.getUTCHours() !== hour ||
    local.getUTCMinutes() !== minute ||
    local.getUTCSeconds() !== second
  ) {
    return null;
  }

  let offsetMinutes = 0;
  if (zone.toUpperCase() !== "Z") {
    const digits = zone.slice(1).replace(":", "");
    const hours = Number(digits.slice(0, 2));
    const minutes = Number(digits.slice(2));
    if (hours > 23 || minutes > 59) return null;
    offsetMinutes = (zone.startsWith("-") ? -1 : 1) * (hours * 60 + minutes);
  }

  return {
    date: `${pad(year, 4)}-${pad(month)}-${pad(day)}`,
    epochMs: local.getTime() - offsetMinutes * 60_000
  };
};

const fail = (ctx: z.RefinementCtx, message: string) => {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message });
  return z.NEVER;
};

const numberLike = z
  .union([z.number(), z.string().regex(NUMERIC).transform(Number)])
  .pipe(z.number().finite());

const coercers: Record<FieldType, z.ZodType<FieldValue, z.ZodTypeDef, unknown>> = {
  string: z.union([z.string(), z.number().finite(), z.boolean()]).transform((value) => String(value)),
  integer: numberLike.pipe(z.number().int().safe()),
  decimal: numberLike,
  boolean: z.union([
    z.boolean(),
    z.union([z.string(), z.number()]).transform((value, ctx) => {
      const word = String(value).trim().toLowerCase();
      if (TRUE_WORDS.has(word)) return true;
      if (FALSE_WORDS.has(word)) return false;
      return fail(ctx, "not a boolean");
    })
  ]),
  date: z.string().transform((value, ctx) => {
    const parsed = parseTimestamp(value);
    return parsed ? parsed.date : fail(ctx, "not a date");
  }),
  timestamp: z.string().transform((value, ctx) => {
    const parsed = parseTimestamp(value);
    return parsed ? new Date(parsed.epochMs).toISOString() : fail(ctx, "not a timestamp");
  })
};

export type Coerced = { ok: true; value: FieldValue } | { ok: false };

export const coerceValue = (value: unknown, type: FieldType): Coerced => {
  if (value === null || value === undefined) return { ok: true, value: null };
  const parsed = coercers[type].safeParse(value);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false };
};
