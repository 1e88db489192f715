import { Command } from 'commander';
import { validateCardCsv } from '../../domain/services/CardCsvValidator.js';
import { CsvParser } from '../../infrastructure/parsers/CsvParser.js';
import { FilePathSource } from '../../infrastructure/sources/FilePathSource.js';
import { readAll } from '../../infrastructure/sources/readAll.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export interface CheckOptions {
  /** Fail when any row is invalid. */
  readonly strict?: boolean;
}

/**
 * Run the check command on a generated card CSV. Returns the process exit code.
 */
export async function runCheck(csvPath: string, options: CheckOptions = {}, log: Logger = defaultLogger): Promise<number> {
  try {
    const csv = await readAll(new FilePathSource(csvPath));
    const report = validateCardCsv(csv, new CsvParser({ skipEmptyLines: false }));

    for (const invalid of report.invalidRows) {
      log.warn(`Ignoring an invalid row ${String(invalid.rowNumber)} in ${csvPath}: ${JSON.stringify(invalid.fields)}`);
    }

    if (report.header === null) {
      log.warn(`${csvPath} is empty`);
    }

    log.info(`${String(report.rows.length)} valid cards, ${String(report.invalidRows.length)} invalid rows in ${csvPath}`);
    return options.strict === true && report.invalidRows.length > 0 ? 1 : 0;
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

/**
 * Create the check command.
 */
export function createCheckCommand(log?: Logger): Command {
  return new Command('check')
    .description('Check a generated card CSV for rows without exactly four fields')
    .argument('<csv-path>', 'path to the CSV file with the generated cards')
    .option('--strict', 'exit with code 1 when any row is invalid')
    .action(async (csvPath: string, options: CheckOptions) => {
      const code = await runCheck(csvPath, options, log);
      if (code !== 0) process.exit(code);
    });
}
