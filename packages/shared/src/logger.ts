import pc from 'picocolors';

export const log = {
  info: (msg: string) => console.log(`${pc.cyan('[waymark]')} ${msg}`),
  success: (msg: string) => console.log(`${pc.green('[waymark]')} ${msg}`),
  warn: (msg: string) => console.warn(`${pc.yellow('[waymark]')} ${msg}`),
  error: (msg: string) => console.error(`${pc.red('[waymark]')} ${msg}`),
};
