import 'dotenv/config';
import path from 'node:path';

export const clientConfig = {
  serverUrl: process.env.HOSTPULSE_URL ?? 'ws://localhost:8787/ws',
  apiUrl: process.env.HOSTPULSE_API_URL ?? 'http://localhost:8787/api',
  clientIdPath: process.env.HOSTPULSE_CLIENT_ID_PATH ?? path.resolve(process.cwd(), '.hostpulse/client-id.json'),
  logLevel: process.env.LOG_LEVEL ?? 'warn'
};
