import chalk from 'chalk';
import dayjs from 'dayjs';

function timestamp(): string {
  // Local time in a readable format
  return dayjs().format('YYYY-MM-DD HH:mm:ss');
}

// Shape of WebapiError from spotify-web-api-node
interface HttpErrorFields {
  statusCode?: unknown;
  body?: unknown;
}

function httpFields(err: Error): HttpErrorFields {
  const fields: HttpErrorFields = {};
  if ('statusCode' in err) fields.statusCode = err.statusCode;
  if ('body' in err) fields.body = err.body;
  return fields;
}

export class Logger {
  private static quiet = false;

  // --quiet: suppress info lines, keep warnings and errors
  static setQuiet(quiet: boolean): void {
    Logger.quiet = quiet;
  }

  static info(message: string): void {
    if (Logger.quiet) return;
    console.log(`${timestamp()} ${chalk.blueBright('[INFO]')} ${message}`);
  }

  static warn(message: string): void {
    console.warn(`${timestamp()} ${chalk.yellow('[WARN]')} ${message}`);
  }

  static error(message: string, err?: unknown): void {
    let detail = '';
    if (err instanceof Error) {
      detail = `\n${err.name}: ${err.message}`;

      const webapiErr = httpFields(err);
      if (webapiErr.statusCode !== undefined) {
        detail += `\nHTTP Status: ${String(webapiErr.statusCode)}`;
      }
      if (webapiErr.body) {
        try {
          const bodyStr = typeof webapiErr.body === 'string'
            ? webapiErr.body
            : JSON.stringify(webapiErr.body, null, 2);
          detail += `\nResponse Body: ${bodyStr}`;
        } catch {
          detail += `\nResponse Body: ${String(webapiErr.body)}`;
        }
      }

      if (err.stack) {
        detail += `\n${err.stack}`;
      }
    } else if (err) {
      try {
        detail = `\n${JSON.stringify(err, null, 2)}`;
      } catch {
        detail = `\n${String(err)}`;
      }
    }
    console.error(`${timestamp()} ${chalk.red('[ERROR]')} ${message}${detail}`);
  }

  static debug(message: string): void {
    // Only emit debug logs when LOG_LEVEL=debug or DEBUG is truthy
    const ll = (process.env.LOG_LEVEL || '').toLowerCase();
    const dbg = (process.env.DEBUG || '').toLowerCase();
    const debugEnabled = ll === 'debug' || dbg === '1' || dbg === 'true' || dbg === 'yes' || dbg === 'on';
    if (!debugEnabled) return;
    console.debug(`${timestamp()} ${message}`);
  }
}
