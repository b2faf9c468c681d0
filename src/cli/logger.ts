import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { siteKey, type IssuanceResult } from '../lib/index.js';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  succeed(text?: string): SpinnerHandle;
  fail(text?: string): SpinnerHandle;
  stop(): void;
}

/**
 * Chainable wrapper around ora with consistent colors
 */
export function createSpinner(): SpinnerHandle {
  let spinner: Ora | undefined;

  return {
    start(text: string) {
      if (!spinner) spinner = ora(text).start();
      else spinner.text = text;
      return this;
    },
    succeed(text?: string) {
      spinner?.succeed(text && chalk.green(text));
      return this;
    },
    fail(text?: string) {
      spinner?.fail(text && chalk.red(text));
      return this;
    },
    stop() {
      spinner?.stop();
    },
  };
}

export const symbols = {
  success: chalk.green('✔'),
  fail: chalk.red('✖'),
  warn: chalk.yellow('⚠'),
  info: chalk.cyan('ℹ'),
};

export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

export const render = {
  line(msg = '') {
    console.log(msg);
  },
  success(msg: string) {
    console.log(symbols.success + ' ' + chalk.green(msg));
  },
  info(msg: string) {
    console.log(symbols.info + ' ' + chalk.cyan(msg));
  },
  warn(msg: string) {
    console.log(symbols.warn + ' ' + chalk.yellow(msg));
  },
  error(msg: string) {
    console.log(symbols.fail + ' ' + chalk.red(msg));
  },
  list(values: string[]) {
    values.forEach((v) => console.log('  - ' + chalk.white(v)));
  },
};

/** One-line summary of a finished job, without colors */
export function describeResult(result: IssuanceResult): string {
  const target = `${siteKey(result.job.site)} [${result.job.dnsNames.join(', ')}]`;
  if (result.status === 'completed') {
    const cert = result.certificate;
    return cert
      ? `${target}: issued ${cert.thumbprint}, expires ${cert.expiresOn.toISOString()}`
      : `${target}: completed`;
  }

  const failure = result.failure;
  return failure
    ? `${target}: ${failure.kind} failure at ${failure.step}: ${failure.message}`
    : `${target}: failed`;
}

export function renderResult(result: IssuanceResult): void {
  if (result.status === 'completed') render.success(describeResult(result));
  else render.error(describeResult(result));
  if (result.restarts > 0) {
    kv('restarts', String(result.restarts));
  }
}
