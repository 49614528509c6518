#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { recalculateInvoice, recalculateOpenInvoices } from './service/recalculate';
import { supabase } from './supabase/client';
import { getParamsRevision, getTimeParams, saveTimeParams, setSummerMode } from './supabase/settings';

function parseLimit(value: string): number {
  const limit = Number.parseInt(value, 10);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError('Limit must be a positive integer.');
  }
  return limit;
}

function parseToggle(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'on') return true;
  if (normalized === 'off') return false;
  throw new InvalidArgumentError('Expected "on" or "off".');
}

const program = new Command();

program
  .name('order-time-estimator')
  .description('Estimate how long warehouse invoices take to pick and pack')
  .version('1.0.0');

program
  .command('recalc <invoiceNo...>')
  .description('Re-estimate the given invoices and store the minutes')
  .option('--snapshot', 'Record an audit run for each estimate')
  .option('--reason <reason>', 'Reason stored with the audit run', 'manual')
  .action(async (invoiceNumbers: string[], opts: { snapshot?: boolean; reason: string }) => {
    let failures = 0;
    for (const invoiceNo of invoiceNumbers) {
      try {
        const { result, runId } = await recalculateInvoice(supabase, invoiceNo, {
          snapshot: opts.snapshot,
          reason: opts.reason,
        });
        const { breakdownMinutes } = result;
        console.log(
          `${invoiceNo}: ${result.totalMinutes.toFixed(2)} min ` +
            `(overhead ${breakdownMinutes.overheadSeconds.toFixed(2)}, travel ${breakdownMinutes.travelSeconds.toFixed(2)}, ` +
            `pick ${breakdownMinutes.pickSeconds.toFixed(2)}, pack ${breakdownMinutes.packSeconds.toFixed(2)})` +
            (runId !== null ? ` run ${runId}` : ''),
        );
      } catch (error) {
        failures += 1;
        console.error(`Recalculation of ${invoiceNo} failed:`, error instanceof Error ? error.message : error);
      }
    }
    process.exitCode = failures > 0 ? 1 : 0;
  });

program
  .command('recalc-open')
  .description('Re-estimate every invoice still open in the warehouse')
  .option('--status <status...>', 'Statuses counted as open')
  .option('-l, --limit <n>', 'Max invoices to touch', parseLimit)
  .option('--snapshot', 'Record an audit run for each estimate')
  .action(async (opts: { status?: string[]; limit?: number; snapshot?: boolean }) => {
    const outcome = await recalculateOpenInvoices(supabase, {
      statuses: opts.status,
      limit: opts.limit,
      snapshot: opts.snapshot,
    });
    for (const failure of outcome.failed) {
      console.error(`  ${failure.invoiceNo}: ${failure.error}`);
    }
    process.exitCode = outcome.failed.length > 0 ? 1 : 0;
  });

program
  .command('summer-mode <state>')
  .description('Turn summer handling on or off')
  .action(async (state: string) => {
    await setSummerMode(supabase, parseToggle(state));
  });

const params = program.command('params').description('Inspect or replace the time parameter set');

params
  .command('show')
  .description('Print the effective parameter set and its revision')
  .action(async () => {
    const [timeParams, revision] = await Promise.all([getTimeParams(supabase), getParamsRevision(supabase)]);
    console.log(`Revision ${revision}`);
    console.log(JSON.stringify(timeParams, null, 2));
  });

params
  .command('set <file>')
  .description('Validate and store a parameter set from a JSON file')
  .action(async (file: string) => {
    const payload: unknown = JSON.parse(readFileSync(file, 'utf8'));
    const revision = await saveTimeParams(supabase, payload);
    console.log(`Parameter set stored as revision ${revision}.`);
  });

/**
 * Main entry point for the estimator CLI.
 */
async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error('Estimator command failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void main();
