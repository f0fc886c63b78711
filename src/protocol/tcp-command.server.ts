import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { AddressInfo, Server, Socket, createServer } from 'net';
import { setTimeout as sleep } from 'timers/promises';
import { BrokerService } from '../broker/broker.service';
import { QueueFullException } from '../common/exceptions/broker.exceptions';
import { describeError } from '../common/utils/describe-error';
import { brokerConfig } from '../config/broker.config';
import { formatReply, parseCommandLine } from './command-line';

const BIND_ATTEMPTS = 10;
const BIND_RETRY_DELAY_MS = 6000;
const MAX_REQUEST_BYTES = 1024;
// unterminated input is taken as one whole message once the client goes quiet
const UNTERMINATED_FLUSH_MS = 50;

@Injectable()
export class TcpCommandServer
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(TcpCommandServer.name);
  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();

  constructor(
    private readonly brokerService: BrokerService,
    @Inject(brokerConfig.KEY)
    private readonly config: ConfigType<typeof brokerConfig>,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (this.config.tcpPort === 0) {
      this.logger.log('Text protocol disabled');
      return;
    }

    for (let attempt = 1; ; attempt++) {
      try {
        await this.listen(this.config.tcpPort);
        return;
      } catch (error) {
        if (attempt >= BIND_ATTEMPTS) {
          throw error;
        }
        this.logger.warn(
          `Bind to port ${this.config.tcpPort} failed (${describeError(error)}), retrying in ${BIND_RETRY_DELAY_MS} ms`,
        );
        await sleep(BIND_RETRY_DELAY_MS);
      }
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.close();
  }

  listen(port: number, host: string = '0.0.0.0'): Promise<AddressInfo> {
    const server = createServer((socket) => this.handleConnection(socket));

    return new Promise<AddressInfo>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        server.on('error', (error) =>
          this.logger.error(`Text protocol server error: ${error.message}`),
        );
        this.server = server;

        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Text protocol server is not bound to a TCP port'));
          return;
        }
        this.logger.log(`Text protocol listening on ${host}:${address.port}`);
        resolve(address);
      });
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve())),
    );
  }

  /** Answers one request line. */
  async handleLine(line: string): Promise<string> {
    const parsed = parseCommandLine(line);
    if (!parsed.ok) {
      return parsed.error;
    }

    try {
      const reply = await this.brokerService.submitAndWait(
        parsed.verb,
        parsed.board,
        parsed.target,
      );
      return formatReply(reply, this.config.commandTtlMs);
    } catch (error) {
      if (error instanceof QueueFullException) {
        return 'Error: queue full';
      }
      this.logger.error(`Failed to answer "${line.trim()}": ${describeError(error)}`);
      return 'Error: internal error';
    }
  }

  private handleConnection(socket: Socket): void {
    this.sockets.add(socket);
    socket.setEncoding('utf8');

    let buffered = '';
    let pending = Promise.resolve();
    let flushTimer: NodeJS.Timeout | null = null;

    // Replies mirror the request framing: newline-terminated lines get a
    // newline, a bare message gets a bare reply.
    const answer = (line: string, terminator: string): void => {
      pending = pending
        .then(() => this.handleLine(line))
        .then((reply) => {
          if (socket.writable) {
            socket.write(`${reply}${terminator}`);
          }
        })
        .catch((error: unknown) =>
          this.logger.error(`Failed to reply: ${describeError(error)}`),
        );
    };

    socket.on('data', (chunk: string) => {
      if (!socket.writable) {
        return;
      }
      if (flushTimer) {
        clearTimeout(flushTimer);
        flushTimer = null;
      }

      buffered += chunk;
      const lines = buffered.split(/\r?\n/);
      buffered = lines.pop() ?? '';

      for (const line of lines) {
        if (line.trim().length > 0) {
          answer(line, '\n');
        }
      }

      if (Buffer.byteLength(buffered) > MAX_REQUEST_BYTES) {
        buffered = '';
        this.logger.warn('Closing a connection whose request grew too long');
        socket.end(`Error: request exceeds ${MAX_REQUEST_BYTES} bytes.\n`);
        return;
      }

      if (buffered.trim().length > 0) {
        flushTimer = setTimeout(() => {
          flushTimer = null;
          const message = buffered;
          buffered = '';
          answer(message, '');
        }, UNTERMINATED_FLUSH_MS);
      }
    });

    socket.on('error', (error) =>
      this.logger.debug(`Client connection error: ${error.message}`),
    );
    socket.on('close', () => {
      if (flushTimer) {
        clearTimeout(flushTimer);
      }
      this.sockets.delete(socket);
    });
  }
}
