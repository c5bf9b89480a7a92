export * from './instance.js';
export * from './ssh.js';
