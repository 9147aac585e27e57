/**
 * Workflow tools
 *
 * Each tool runs one named accounting workflow. Sections that could not be
 * built are listed under `errors` and the status becomes PartiallyFailed.
 */

import * as z from 'zod';
import {
  biweeklyPayroll,
  clientInvoice,
  monthEndClosing,
  projectProfitability,
  quarterlyTaxPrep,
} from '../workflows/index.js';
import { defineTool, rangeParams, type ToolContext, type ToolDefinition } from './shared.js';

const month = z.number().int().min(1).max(12);
const quarter = z.number().int().min(1).max(4);
const year = z.number().int().min(2000).max(2100);

export function workflowTools(ctx: ToolContext): ToolDefinition[] {
  const { orchestrator } = ctx;

  return [
    defineTool({
      name: biweeklyPayroll.name,
      description: `${biweeklyPayroll.description}. Reports: payroll_summary, overtime_report, pto_usage, department_breakdown.`,
      schema: {
        end_date: z.string().optional().describe('Last day of the pay period (default: today); natural language works'),
      },
      run: (params, signal) => orchestrator.run(biweeklyPayroll, params, { signal }),
    }),

    defineTool({
      name: monthEndClosing.name,
      description: `${monthEndClosing.description}. Reports: monthly_payroll_summary, client_billing_summary, project_costs, employee_utilization, timesheet_review.`,
      schema: {
        month: month.optional().describe('Month 1-12 (default: last month)'),
        year: year.optional().describe('Year (default: the most recent such month)'),
      },
      run: (params, signal) => orchestrator.run(monthEndClosing, params, { signal }),
    }),

    defineTool({
      name: quarterlyTaxPrep.name,
      description: `${quarterlyTaxPrep.description}. Reports: wages_by_employee, hours_summary, overtime_wages, pto_payouts, department_breakdown.`,
      schema: {
        quarter: quarter.optional().describe('Quarter 1-4 (default: the last completed quarter)'),
        year: year.optional().describe('Year (default: the most recent such quarter)'),
      },
      run: (params, signal) => orchestrator.run(quarterlyTaxPrep, params, { signal }),
    }),

    defineTool({
      name: clientInvoice.name,
      description: `${clientInvoice.description}. Reports: hours_by_employee, hours_by_jobcode, daily_breakdown, invoice_totals.`,
      schema: {
        client_name: z.string().describe('Client name; approximate names are matched'),
        ...rangeParams,
        hourly_rate: z.number().positive().optional().describe('Flat hourly rate instead of the jobcode billable rates'),
      },
      run: (params, signal) => orchestrator.run(clientInvoice, params, { signal }),
    }),

    defineTool({
      name: projectProfitability.name,
      description: `${projectProfitability.description}. Reports: hours_by_employee, labor_costs, profitability.`,
      schema: {
        project_name: z.string().describe('Project name; "Client Project" and approximate names are matched'),
        ...rangeParams,
      },
      run: (params, signal) => orchestrator.run(projectProfitability, params, { signal }),
    }),
  ];
}
