import 'dotenv/config';
import { join } from 'path';

export function validateEnv(): void {
  const rawPort = process.env.PORT;
  if (rawPort !== undefined && rawPort !== '') {
    const port = Number(rawPort);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      console.error(`Invalid PORT "${rawPort}": expected an integer between 1 and 65535`);
      console.error('Fix it in your .env file. See .env.example');
      process.exit(1);
    }
  }
}

export const config = {
  get PORT() { return parseInt(process.env.PORT || '8000', 10); },
  get HOST() { return process.env.HOST || '0.0.0.0'; },
  get STATIC_DIR() { return process.env.STATIC_DIR || join(process.cwd(), 'static'); },
};
