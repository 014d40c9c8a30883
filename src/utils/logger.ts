import winston from 'winston';

const LOG_FILE = process.env.LOG_FILE;
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (LOG_FILE) {
  transports.push(new winston.transports.File({ filename: `${LOG_FILE}.error.log`, level: 'error' }));
  transports.push(new winston.transports.File({ filename: `${LOG_FILE}.log` }));
}

const logger = winston.createLogger({
  level: LOG_LEVEL,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
