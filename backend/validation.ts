import { format, isValid, parse } from "date-fns";
import * as z from "zod";
import { ValidationError } from "./errors";
import { MAX_INTEGER, ROLES } from "./types";

const DATE_FORMAT = "yyyy-MM-dd";

export function isCalendarDate(value: string) {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parse(value, DATE_FORMAT, new Date()));
}

export function today(now: Date = new Date()) {
  return format(now, DATE_FORMAT);
}

const calendarDate = z
  .string()
  .trim()
  .refine(isCalendarDate, { message: "must be a valid date in YYYY-MM-DD format" });

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform(v => (v ? v : null));

const positiveInt = z.number().int().positive().max(MAX_INTEGER);
const count = z.number().int().nonnegative().max(MAX_INTEGER);

export const idParam = z.coerce.number().int().positive();

export const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export const createStoreSchema = z.object({
  name: z.string().trim().min(1).max(100),
  location: optionalText(200),
  license_validity: calendarDate,
});

export const updateLicenseSchema = z.object({
  new_validity: calendarDate,
});

export const createUserSchema = z
  .object({
    username: z.string().trim().min(1).max(80),
    password: z.string().min(1),
    role: z.enum(ROLES),
    store_id: positiveInt.nullish().transform(v => v ?? null),
  })
  .superRefine((u, ctx) => {
    if (u.role !== "superadmin" && u.store_id === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["store_id"],
        message: "A store_id must be provided for admin and store roles",
      });
    }
    if (u.role === "superadmin" && u.store_id !== null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["store_id"],
        message: "Superadmin cannot be assigned to a store",
      });
    }
  });

const productFields = {
  barcode: optionalText(100),
  name: z.string().trim().min(1).max(100),
  brand: optionalText(100),
  category: optionalText(50),
  size_ml: count,
  price: z.number().nonnegative().finite(),
};

export const createProductSchema = z.object({
  ...productFields,
  stock_quantity: count.default(0),
});

export const updateProductSchema = z
  .object(productFields)
  .partial()
  .refine(fields => Object.values(fields).some(v => v !== undefined), {
    message: "at least one field must be provided",
  });

export const addStockSchema = z.object({
  add_stock: positiveInt,
});

export const billSchema = z.object({
  items: z
    .array(
      z.object({
        id: positiveInt,
        quantity: positiveInt,
      })
    )
    .default([]),
});

function describe(error: z.ZodError) {
  const issue = error.issues[0];
  if (!issue) return "Invalid request";
  return issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) throw new ValidationError(describe(result.error));
  return result.data;
}
