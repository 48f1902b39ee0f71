import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { decodeDescription } from './description.js';
import { data, formatResponse, ok, type Response } from './responses.js';
import { logger } from '../utils/logger.js';
import { LauncherSpawnError } from '../utils/errors.js';
import type { PinentrySessionOptions, SessionOutcome, SessionState } from './types.js';

const log = logger.child({ component: 'session' });

export const PROTOCOL_VERSION = '0.1';

const ERROR_OPEN = '_ERO_';
const ERROR_CLOSE = '_ERC';

function splitCommand(line: string): { command: string; args: string } {
  const boundary = line.search(/\s/);
  if (boundary === -1) {
    return { command: line, args: '' };
  }
  return { command: line.slice(0, boundary), args: line.slice(boundary + 1).trim() };
}

function isBrokenPipe(err: Error): boolean {
  return 'code' in err && err.code === 'EPIPE';
}

/**
 * One pinentry conversation. Every command is accepted in any state until
 * BYE; unknown commands are acknowledged and ignored.
 */
export class PinentrySession {
  private readonly state: SessionState = { prompt: '', message: '' };
  private closed = false;

  constructor(private readonly options: PinentrySessionOptions) {}

  isClosed(): boolean {
    return this.closed;
  }

  getState(): Readonly<SessionState> {
    return { ...this.state };
  }

  async handleLine(line: string): Promise<Response[]> {
    if (this.closed) {
      return [];
    }

    const trimmed = line.trim();
    if (trimmed.startsWith('#')) {
      return [ok()];
    }

    const { command, args } = splitCommand(trimmed);
    log.debug({ command, args }, 'Received command');

    switch (command) {
      case 'GETINFO':
        return this.getInfo(args);

      case 'SETDESC': {
        const { prompt, message } = decodeDescription(args);
        this.state.prompt = prompt;
        this.state.message = message;
        return [ok()];
      }

      case 'SETERROR':
        this.state.errorAnnotation = `${ERROR_OPEN}${args.toUpperCase()}${ERROR_CLOSE}`;
        return [ok()];

      case 'SETPROMPT':
        this.state.prompt = args.replace(/:/g, '');
        return [ok()];

      case 'GETPIN':
        return this.getPin();

      case 'BYE':
        this.closed = true;
        return [ok('closing connection')];

      default:
        return [ok()];
    }
  }

  async run(input: Readable, output: Writable): Promise<SessionOutcome> {
    const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });
    const delivery: { peerGone: boolean; error: Error | null } = { peerGone: false, error: null };

    // Stays attached: a write queued just before returning can still fail later.
    output.on('error', (err: Error) => {
      if (isBrokenPipe(err)) {
        log.info('Peer closed the connection');
        delivery.peerGone = true;
      } else if (delivery.error === null) {
        delivery.error = err;
      } else {
        log.error({ err }, 'Failed to write response');
      }
      lines.close();
    });

    this.send(output, [ok('Pleased to meet you')]);

    try {
      for await (const line of lines) {
        const responses = await this.handleLine(line);
        if (delivery.peerGone || delivery.error) {
          break;
        }
        this.send(output, responses);
        if (this.closed) {
          return 'closed';
        }
      }
    } finally {
      lines.close();
    }

    if (delivery.error) {
      throw delivery.error;
    }
    return 'disconnected';
  }

  private getInfo(topic: string): Response[] {
    switch (topic) {
      case 'flavor':
        return [data(this.options.runner.name), ok()];
      case 'version':
        return [data(PROTOCOL_VERSION), ok()];
      case 'ttyinfo':
        return [data('- - -'), ok()];
      case 'pid':
        return [data(String(this.options.pid ?? process.pid)), ok()];
      default:
        // Peers get no reply at all here, not even OK.
        log.debug({ topic }, 'Unknown GETINFO topic');
        return [];
    }
  }

  private async getPin(): Promise<Response[]> {
    const message = `${this.state.errorAnnotation ?? ''}${this.state.message}`;

    try {
      const result = await this.options.launcher.prompt(this.options.runner.executableTemplate, {
        prompt: this.state.prompt,
        message,
      });

      if (result.accepted && result.secret) {
        return [data(result.secret), ok()];
      }

      log.info({ accepted: result.accepted }, 'No secret returned');
      return [ok()];
    } catch (err) {
      if (!(err instanceof LauncherSpawnError)) {
        throw err;
      }
      log.warn({ err }, 'Launcher could not be started');
      return [ok()];
    }
  }

  private send(output: Writable, responses: Response[]): void {
    for (const response of responses) {
      output.write(`${formatResponse(response)}\n`);
    }
  }
}
