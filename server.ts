/**
 * Video Task Pipeline API Server
 *
 * Main entry point: serves the task API and runs submitted tasks in the
 * background of the same process.
 */

import { Server } from 'node:http';
import { createApp } from './src/api/app.js';
import { createAuthenticateUser } from './src/api/middleware/auth.js';
import { ClientFactory, ConfigService, createPipelineRuntime, PipelineRuntime } from './src/worker/index.js';

/**
 * Application - Main application class
 */
class Application {
  private configService: ConfigService;
  private clientFactory: ClientFactory;
  private runtime: PipelineRuntime;
  private server: Server | null = null;
  private shuttingDown = false;

  constructor() {
    // Create config service first
    this.configService = new ConfigService();
    this.clientFactory = new ClientFactory(this.configService);
    this.runtime = createPipelineRuntime(this.configService, this.clientFactory);

    // Set up graceful shutdown
    this.setupGracefulShutdown();
  }

  /**
   * Set up graceful shutdown handlers
   */
  setupGracefulShutdown() {
    process.on('SIGINT', () => void this.shutdown());
    process.on('SIGTERM', () => void this.shutdown());

    console.log('Graceful shutdown handlers registered');
  }

  /**
   * Stop accepting requests and runs, then wait for running tasks
   */
  async shutdown() {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    console.log('Shutting down...');

    this.runtime.worker.stop();
    this.server?.close();

    await this.runtime.worker.drain();

    console.log('Shutdown complete');
    process.exit(0);
  }

  /**
   * Start the application
   */
  async start() {
    process.env.NODE_ENV = process.env.NODE_ENV || 'development';
    console.log(`Server running in ${process.env.NODE_ENV} mode`);

    this.configService.validateEnvironment();

    await this.runtime.pipeline.recoverInterruptedTasks();
    this.runtime.worker.start();

    const app = createApp({
      pipeline: this.runtime.pipeline,
      authenticateUser: createAuthenticateUser(this.clientFactory.createAuthClient())
    });

    const port = this.configService.port;
    this.server = app.listen(port, () => {
      console.log(`Server is running on port ${port}`);
      console.log(`API base URL: http://localhost:${port}/api`);
    });
  }
}

// Initialize the server
new Application().start().catch(error => {
  console.error('Unhandled error during server startup:', error);
  process.exit(1);
});
