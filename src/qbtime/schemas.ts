/**
 * Zod schemas for QuickBooks Time responses
 *
 * Records are validated as they are read off a page. Missing optional fields
 * get the API's documented defaults; unknown fields pass through.
 */

import { z } from 'zod';
import type {
  Group,
  Jobcode,
  ListEnvelope,
  LooseRecord,
  Timesheet,
  User,
} from './types.js';

export const jobcodeTypeSchema = z.enum(['regular', 'pto', 'paid_break', 'unpaid_break']);

export const jobcodeSchema: z.ZodType<Jobcode, z.ZodTypeDef, unknown> = z
  .object({
    id: z.number(),
    parent_id: z.number().default(0),
    name: z.string(),
    short_code: z.string().default(''),
    type: jobcodeTypeSchema.default('regular'),
    active: z.boolean().default(true),
    billable: z.boolean().default(false),
    billable_rate: z.number().default(0),
    has_children: z.boolean().default(false),
    assigned_to_all: z.boolean().default(false),
    last_modified: z.string().default(''),
    double_time: z.boolean().optional(),
  })
  .passthrough();

export const userSchema: z.ZodType<User, z.ZodTypeDef, unknown> = z
  .object({
    id: z.number(),
    first_name: z.string().default(''),
    last_name: z.string().default(''),
    display_name: z.string().default(''),
    group_id: z.number().default(0),
    active: z.boolean().default(true),
    employee_number: z.number().default(0),
    payroll_id: z.coerce.string().default(''),
    email: z.string().default(''),
    username: z.string().default(''),
    pay_rate: z.number().default(0),
    pay_interval: z.string().default('hour'),
    hire_date: z.string().default(''),
    last_modified: z.string().default(''),
  })
  .passthrough();

export const groupSchema: z.ZodType<Group, z.ZodTypeDef, unknown> = z
  .object({
    id: z.number(),
    name: z.string(),
    active: z.boolean().default(true),
    manager_ids: z.array(z.coerce.number()).default([]),
    last_modified: z.string().default(''),
  })
  .passthrough();

export const timesheetSchema: z.ZodType<Timesheet, z.ZodTypeDef, unknown> = z
  .object({
    id: z.number(),
    user_id: z.number(),
    jobcode_id: z.number(),
    start: z.string().default(''),
    end: z.string().default(''),
    duration: z.number().default(0),
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    tz: z.number().default(0),
    locked: z.number().default(0),
    notes: z.string().default(''),
    customfields: z.record(z.coerce.string()).default({}),
    last_modified: z.string().default(''),
    type: z.enum(['regular', 'manual']).default('regular'),
    on_the_clock: z.boolean().default(false),
    double_time: z.boolean().optional(),
  })
  .passthrough();

export const looseRecordSchema: z.ZodType<LooseRecord, z.ZodTypeDef, unknown> = z.record(z.unknown());

export const timestampSchema = z.string();

/** Report sections are passed through as sent */
export const reportValueSchema: z.ZodType<unknown, z.ZodTypeDef, unknown> = z.unknown();

export const envelopeSchema: z.ZodType<ListEnvelope, z.ZodTypeDef, unknown> = z
  .object({
    results: z.record(z.unknown()),
    more: z.boolean().optional(),
    supplemental_data: z.record(z.unknown()).optional(),
  })
  .passthrough();

/**
 * Upstream error body: `{ error: { code, message } }`
 */
export const errorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
  }),
});
