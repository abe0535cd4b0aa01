import winston from "winston";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";

// Reports are files; every diagnostic goes to stderr so stdout stays clean for piping.
const STDERR_LEVELS = Object.keys(winston.config.npm.levels);

const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: winston.format.timestamp({ format: "HH:mm:ss" }),
  transports: [
    new winston.transports.Console({
      stderrLevels: STDERR_LEVELS,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, module: mod, region }) => {
          const tag = mod ? ` [${mod}]` : "";
          const where = region !== undefined ? ` (${region})` : "";
          return `${timestamp} ${level}:${tag} ${message}${where}`;
        })
      ),
    }),
  ],
});

export default logger;
