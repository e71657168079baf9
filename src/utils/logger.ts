import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

class Logger {
  private servers = new Set<McpServer>();
  private currentLevel: LogLevel = 'info';

  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3,
  };

  /** Forward log lines to a connected MCP server as `notifications/message`. */
  attachServer(server: McpServer): void {
    this.servers.add(server);
  }

  detachServer(server: McpServer): void {
    this.servers.delete(server);
  }

  setLevel(level: string): void {
    if (this.isValidLevel(level)) {
      this.currentLevel = level;
    }
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  private isValidLevel(level: string): level is LogLevel {
    return level in this.levels;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.currentLevel];
  }

  private async log(level: LogLevel, loggerName: string, data: unknown): Promise<void> {
    if (!this.shouldLog(level)) {
      return;
    }

    let delivered = false;
    for (const server of this.servers) {
      if (!server.isConnected()) {
        continue;
      }
      try {
        await server.server.sendLoggingMessage({ level, logger: loggerName, data });
        delivered = true;
      } catch (error) {
        // Client went away between the check and the send; fall back to console.
        this.servers.delete(server);
        this.write('warning', 'logger', {
          message: 'Dropped MCP log sink',
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (!delivered) {
      this.write(level, loggerName, data);
    }
  }

  private write(level: LogLevel, loggerName: string, data: unknown): void {
    const timestamp = new Date().toISOString();
    const payload = typeof data === 'object' ? JSON.stringify(data) : String(data);
    // eslint-disable-next-line no-console
    console.log(`[${timestamp}] ${level.toUpperCase()} ${loggerName}: ${payload}`);
  }

  async debug(loggerName: string, data?: unknown): Promise<void> {
    await this.log('debug', loggerName, data ?? {});
  }
  async info(loggerName: string, data?: unknown): Promise<void> {
    await this.log('info', loggerName, data ?? {});
  }
  async warning(loggerName: string, data?: unknown): Promise<void> {
    await this.log('warning', loggerName, data ?? {});
  }
  async error(loggerName: string, data?: unknown): Promise<void> {
    await this.log('error', loggerName, data ?? {});
  }
}

export const logger = new Logger();
