import winston from "winston";
import { config } from "./index.js";

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  defaultMeta: { service: "kube-machine-driver" },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [new winston.transports.Console()],
});
