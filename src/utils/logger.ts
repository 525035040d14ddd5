import winston from 'winston';

const isTest = process.env.NODE_ENV === 'test';

const transports: winston.transport[] = [
    new winston.transports.Console({
        silent: isTest,
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
        ),
    }),
];

if (!isTest) {
    transports.push(new winston.transports.File({ filename: 'error.log', level: 'error' }));
    transports.push(new winston.transports.File({ filename: 'combined.log' }));
}

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL ?? 'info',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    ),
    transports,
});

export default logger;
