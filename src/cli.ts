#!/usr/bin/env -S node --import tsx
import { resolve } from 'node:path';

import { Option, program } from '@commander-js/extra-typings';
import chalk from 'chalk';

import { AttemptRunner, type RunOutcome } from './AttemptRunner.ts';
import { CombinationSpace, describeCombination, describeCombinationId } from './combinations.ts';
import {
  DEFAULT_EXECUTABLE,
  DEFAULT_PROGRESS_FILE,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_TOKEN_SLOTS,
  ENV,
  parseRunConfig,
} from './config.ts';
import { buildCredentialSet, countFactors, type CredentialSet, type RawPassphrase } from './credentials.ts';
import { fingerprintFile } from './fingerprint.ts';
import { KeepassxcProbe } from './KeepassxcProbe.ts';
import { logger, setLogLevel } from './logger.ts';
import { ProgressFS } from './ProgressFS.ts';
import type { RecoveryTarget } from './ProgressState.ts';
import { ProgressStore } from './ProgressStore.ts';
import { EXIT_CODES, IntegrityMismatchError, RecoverError } from './RecoverError.ts';
import { estimateRemaining, formatDuration, type RunProgress } from './RunProgress.ts';
import { readKeyfileDirectory, readPassphraseFile } from './sources.ts';

const recover = program
  .name('kdbx-recover')
  .description('Recover access to a KeePass database by trying combinations of known credentials.')
  .version('0.1.0')
  .addOption(
    new Option('-f, --file <file>', 'path to the progress file')
      .env(ENV.progressFile)
      .default(DEFAULT_PROGRESS_FILE),
  );

recover.command('run')
  .description('try credential combinations until one unlocks the database')
  .argument('<database>', 'path to the .kdbx file')
  .option('-p, --passphrases <file...>', 'files with one candidate passphrase per line')
  .option('--passphrase <value...>', 'candidate passphrases')
  .option('-k, --keyfiles <dir>', 'directory of candidate keyfiles')
  .option('--keyfile <path...>', 'candidate keyfiles')
  .option('--yubikey', 'also try hardware token challenge-response')
  .option('--yubikey-slots <slots>', 'comma-separated token slots to try', DEFAULT_TOKEN_SLOTS)
  .option('--no-empty-passphrase', 'skip combinations without a passphrase')
  .option('--no-empty-keyfile', 'skip combinations without a keyfile')
  .option('--no-empty-token', 'skip combinations without a hardware token')
  .option('--no-resume', 'discard saved progress and start over')
  .option('--strict', 'stop instead of starting over when the database has changed')
  .addOption(
    new Option('-t, --timeout <seconds>', 'time allowed for each attempt')
      .env(ENV.timeout)
      .default(String(DEFAULT_TIMEOUT_SECONDS)),
  )
  .addOption(
    new Option('--cli <path>', 'keepassxc-cli executable')
      .env(ENV.executable)
      .default(DEFAULT_EXECUTABLE),
  )
  .option('--dry-run', 'count the combinations without attempting any')
  .option('--insecure', 'print the winning passphrase in plain text')
  .option('-q, --quiet', 'only print warnings and errors')
  .option('-v, --verbose', 'print every attempt')
  .action(async (database, opts) => {
    configureLogging(opts);

    const config = parseRunConfig(opts);

    const passphrases: RawPassphrase[] = [];
    for (const file of opts.passphrases ?? []) {
      passphrases.push(...await readPassphraseFile(file));
    }
    (opts.passphrase ?? []).forEach((value, i) => passphrases.push({ value, source: `arg:${i + 1}` }));

    const keyfiles: string[] = opts.keyfiles ? await readKeyfileDirectory(opts.keyfiles) : [];
    keyfiles.push(...(opts.keyfile ?? []));

    const set = buildCredentialSet({
      passphrases,
      keyfiles,
      slots: config.slots,
      includeNoPassphrase: opts.emptyPassphrase,
      includeNoKeyfile: opts.emptyKeyfile,
      includeNoToken: opts.emptyToken,
    });
    using _credentials = disposeOnExit(set);

    const space = new CombinationSpace(set);

    if (opts.dryRun) {
      const factors = countFactors(set);
      console.log(`${chalk.bold('passphrases')} ${factors.passphrases}`);
      console.log(`${chalk.bold('keyfiles')}    ${factors.keyfiles}`);
      console.log(`${chalk.bold('token slots')} ${factors.slots}`);
      console.log(`${chalk.bold('combinations')} ${space.count()}`);
      return;
    }

    const target = await openTarget(database);
    const store = new ProgressStore(recover.opts().file);

    if (!opts.resume) {
      await store.reset();
    }

    const runner = new AttemptRunner(store, new KeepassxcProbe({ executable: config.executable }));
    const controller = new AbortController();

    const onSignal = (signal: NodeJS.Signals): void => {
      logger.warn('Stopping after the current attempt', { signal });
      controller.abort();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    using _display = process.stderr.isTTY && !opts.quiet && !opts.verbose
      ? runner.listen(showProgress, { signal: controller.signal })
      : undefined;

    let outcome: RunOutcome;
    try {
      const runOptions = { target, timeoutMs: config.timeoutMs, signal: controller.signal };

      try {
        outcome = await runner.run(space, runOptions);
      } catch (error) {
        if (!(error instanceof IntegrityMismatchError) || opts.strict) {
          throw error;
        }
        logger.warn('Database has changed since the last run; starting over', {
          expected: error.expected,
          actual: error.actual,
        });
        await store.reset();
        outcome = await runner.run(space, runOptions);
      }
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      clearProgress();
    }

    switch (outcome.status) {
      case 'succeeded': {
        const { combination } = outcome;
        console.log(chalk.green('unlocked'), describeCombination(combination));

        if (opts.insecure && combination.passphrase) {
          using bytes = combination.passphrase.reveal();
          console.log(chalk.bold('passphrase'), bytes.toText());
        }
        process.exitCode = EXIT_CODES.success;
        break;
      }
      case 'exhausted':
        console.log(chalk.yellow('exhausted'), `none of ${space.count()} combinations unlocked the database`);
        process.exitCode = EXIT_CODES.exhausted;
        break;
      case 'aborted':
        if (outcome.reason === 'tool-error') {
          throw outcome.error;
        }
        console.log(
          chalk.yellow('interrupted'),
          `${outcome.state.attempts.length} attempts saved to ${store.path}`,
        );
        process.exitCode = EXIT_CODES.interrupted;
        break;
    }
  });

recover.command('status')
  .description('show saved progress for a database')
  .argument('<database>', 'path to the .kdbx file')
  .action(async (database) => {
    const { file: path } = recover.opts();
    const target = await openTarget(database);

    const state = await ProgressFS.read(path, target.fingerprint);
    if (!state) {
      console.log(`No saved progress in ${path}`);
      return;
    }

    const summary = new ProgressStore(path).summarize(state);
    const status = {
      running: chalk.blue,
      succeeded: chalk.green,
      exhausted: chalk.yellow,
    }[summary.status](summary.status);

    console.log(chalk.bold('database'), state.target_path);
    console.log(chalk.bold('status  '), status);
    console.log(
      chalk.bold('progress'),
      `${summary.attempted}/${summary.total} (${summary.percent.toFixed(1)}%)`,
      chalk.dim(`${summary.failed} failed, ${summary.errored} errored`),
    );
    console.log(chalk.bold('started '), summary.startedAt.toISOString());
    console.log(chalk.bold('updated '), summary.updatedAt.toISOString());

    if (summary.winner) {
      console.log(chalk.bold('winner  '), describeCombinationId(summary.winner));
    }
  });

recover.command('reset')
  .description('delete the progress file')
  .action(async () => {
    const { file: path } = recover.opts();
    await new ProgressStore(path).reset();
    console.log(`Removed ${path}`);
  });

function configureLogging(opts: { quiet?: boolean; verbose?: boolean }): void {
  if (opts.quiet && opts.verbose) {
    throw new RecoverError('Options --quiet and --verbose cannot be used together');
  }
  if (opts.verbose) {
    setLogLevel('debug');
  } else if (opts.quiet) {
    setLogLevel('warn');
  }
}

/** Resolve and fingerprint the database file. */
async function openTarget(database: string): Promise<RecoveryTarget> {
  const path = resolve(database);
  return { path, fingerprint: await fingerprintFile(path) };
}

/** Wipe every candidate passphrase from memory when the scope ends. */
function disposeOnExit(set: CredentialSet): Disposable {
  return {
    [Symbol.dispose]: () => {
      for (const passphrase of set.passphrases) {
        passphrase?.[Symbol.dispose]();
      }
    },
  };
}

/** Redraw a one-line progress display on stderr. */
function showProgress(progress: RunProgress): void {
  const done = progress.skipped + progress.attempted;
  const eta = estimateRemaining(progress);
  const parts = [
    chalk.blue(`${done}/${progress.total}`),
    eta === null ? '' : chalk.dim(`eta ${formatDuration(eta)}`),
    progress.current ?? '',
  ];

  process.stderr.write(`\r\x1b[K${parts.filter(Boolean).join(' ')}`);
}

function clearProgress(): void {
  if (process.stderr.isTTY) {
    process.stderr.write('\r\x1b[K');
  }
}

// Process the command line arguments and run the program.
try {
  await recover.parseAsync();
} catch (error) {
  if (error instanceof RecoverError) {
    console.error(chalk.red('error: ') + error.message);
    process.exit(error.exitCode);
  } else {
    throw error;
  }
}
