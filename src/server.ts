import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { getLogger } from './utils/logger';
import { InitializationService } from './services/initialization';
import { TransportManager } from './transport/manager';

/**
 * MCP server exposing the article extractor.
 * Orchestrates initialization and transport connection
 */
export class PageDistillServer {
  private initService: InitializationService;
  private transportManager: TransportManager;

  constructor() {
    this.initService = new InitializationService();
    this.transportManager = new TransportManager();
  }

  /**
   * Initialize the server (environment validation, result cache)
   */
  async initialize(): Promise<void> {
    await this.initService.initialize();
  }

  /**
   * Connect to a transport (default: STDIO)
   */
  async connect(transport?: Transport): Promise<void> {
    await this.transportManager.connect(transport);
  }

  async close(): Promise<void> {
    await this.transportManager.close();
  }

  /**
   * Start the server (initialize + connect)
   */
  async start(): Promise<void> {
    try {
      await this.initialize();
      await this.connect();
    } catch (error) {
      getLogger().error({ error }, 'Failed to start MCP server');
      process.exit(1);
    }
  }
}
