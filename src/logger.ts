import pino from 'pino';

// stdout carries the command reports; log lines go to stderr.
export const logger = pino(
  {
    name: 'srl-lab',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination(2),
);
