import { randomUUID } from 'node:crypto';

// UUID utility used for event ids and tests
export function uuid(): string {
  try {
    return randomUUID();
  } catch {
    return Math.random().toString(36).slice(2) + Date.now().toString(36);
  }
}
