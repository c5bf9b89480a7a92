/**
 * Log Format Tests
 */

import { jsonFormat } from '../transports.js';

const MESSAGE = Symbol.for('message');

function render(info: { level: string; message: string; [key: string]: unknown }): unknown {
  const out = jsonFormat.transform({ ...info });
  if (typeof out === 'boolean') throw new Error('log entry was filtered');
  return JSON.parse(String(out[MESSAGE]));
}

describe('jsonFormat', () => {
  it('should mask sensitive keys anywhere in the metadata', () => {
    expect(render({
      level: 'info',
      message: 'Command failed',
      details: { databaseUrl: 'postgresql://u:hunter2@db/app', PGPASSWORD: 'test' },
    })).toMatchObject({
      level: 'info',
      message: 'Command failed',
      details: { databaseUrl: 'post****/app', PGPASSWORD: '****' },
    });
  });

  it('should mask credentials embedded in commands and messages', () => {
    expect(render({
      level: 'debug',
      message: 'pg_restore postgresql://ops:hunter2@db/app',
      command: 'wget https://backups.example.com/d.dump?sig=abc123&v=2',
    })).toMatchObject({
      message: 'pg_restore postgresql://ops:****@db/app',
      command: 'wget https://backups.example.com/d.dump?sig=****&v=2',
    });
  });

  it('should add the service context and leave plain fields alone', () => {
    expect(render({ level: 'info', message: 'Fan-out started', hosts: ['i-1', 'i-2'] })).toMatchObject({
      service: 'opsdeck',
      hosts: ['i-1', 'i-2'],
    });
  });
});
