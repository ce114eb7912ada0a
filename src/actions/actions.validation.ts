import { z } from "zod";
import { format, isValid, parse } from "date-fns";
import type { ActionFields, ActionPatch, FieldErrors } from "./actions.types.js";
import { ValidationError } from "./actions.errors.js";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const MAX_ACTION_LENGTH = 255;

const DATE_FORMAT = "yyyy-MM-dd";
const DATE_SHAPE = /^\d{4}-\d{2}-\d{2}$/;

export const MESSAGES = {
  required: "This field is required.",
  notAnObject: "Invalid data. Expected an object.",
  actionType: "Not a valid string.",
  actionBlank: "Action cannot be empty.",
  actionTooLong: `Ensure this field has no more than ${MAX_ACTION_LENGTH} characters.`,
  dateFormat: "Date has wrong format. Use YYYY-MM-DD.",
  dateFuture: "Date cannot be in the future.",
  pointsType: "A valid integer is required.",
  pointsPositive: "Points must be a positive integer.",
  pointsTooLarge: `Ensure this value is less than or equal to ${Number.MAX_SAFE_INTEGER}.`,
} as const;

// issues that aren't tied to one field (e.g. an array body)
export const NON_FIELD_ERRORS = "non_field_errors";

/** Calendar date in local time, formatted like the stored `date` field. */
export function today(clock: Clock = systemClock): string {
  return format(clock(), DATE_FORMAT);
}

export function isCalendarDate(value: string): boolean {
  return DATE_SHAPE.test(value) && isValid(parse(value, DATE_FORMAT, new Date()));
}

const actionName = z
  .string({ required_error: MESSAGES.required, invalid_type_error: MESSAGES.actionType })
  .trim()
  .min(1, MESSAGES.actionBlank)
  .max(MAX_ACTION_LENGTH, MESSAGES.actionTooLong);

const points = z
  .number({ required_error: MESSAGES.required, invalid_type_error: MESSAGES.pointsType })
  .int(MESSAGES.pointsType)
  .positive(MESSAGES.pointsPositive)
  // past 2^53 JSON.stringify writes 1e+21 or a rounded neighbour
  .max(Number.MAX_SAFE_INTEGER, MESSAGES.pointsTooLarge);

function calendarDate(clock: Clock) {
  return z
    .string({ required_error: MESSAGES.required, invalid_type_error: MESSAGES.dateFormat })
    .superRefine((value, ctx) => {
      if (!isCalendarDate(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: MESSAGES.dateFormat });
        return;
      }
      // both sides are yyyy-MM-dd, so string order is date order
      if (value > today(clock)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: MESSAGES.dateFuture });
      }
    });
}

export function actionFieldsSchema(clock: Clock = systemClock) {
  return z.object(
    {
      action: actionName,
      date: calendarDate(clock),
      points,
    },
    { required_error: MESSAGES.notAnObject, invalid_type_error: MESSAGES.notAnObject }
  );
}

export function actionPatchSchema(clock: Clock = systemClock) {
  return actionFieldsSchema(clock).partial();
}

/** One message per field: the first rule that failed. */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const out: FieldErrors = {};
  for (const issue of error.issues) {
    const head = issue.path[0];
    const key = head === undefined ? NON_FIELD_ERRORS : String(head);
    if (!out[key]) out[key] = [issue.message];
  }
  return out;
}

export function validateFields(input: unknown, clock: Clock = systemClock): ActionFields {
  const parsed = actionFieldsSchema(clock).safeParse(input);
  if (!parsed.success) throw new ValidationError(toFieldErrors(parsed.error));
  return parsed.data;
}

export function validatePatch(input: unknown, clock: Clock = systemClock): ActionPatch {
  const parsed = actionPatchSchema(clock).safeParse(input);
  if (!parsed.success) throw new ValidationError(toFieldErrors(parsed.error));
  return parsed.data;
}
