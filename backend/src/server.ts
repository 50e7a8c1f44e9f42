import path from 'path';
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createServices } from './services';
import { createApp } from './app';

// Load .env from the working directory first, then let the repo root .env override it
dotenv.config();
dotenv.config({ path: path.resolve(__dirname, '../../.env'), override: true });

const config = loadConfig(process.env);
const services = createServices(config);
const app = createApp(config, services);

const server = app.listen(config.port, config.host, () => {
  console.log(`🚀 Server running on ${config.host}:${config.port}`);
  console.log(`📊 Health check: http://localhost:${config.port}/health`);
  console.log(`💬 Chat endpoint: POST http://localhost:${config.port}/chat`);
  console.log(`📚 History backend: ${services.history.backendKind}`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down gracefully...`);
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
