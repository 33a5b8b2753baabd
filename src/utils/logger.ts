import { pino } from "pino";

export const logger = pino({
  name: "speech-intake",
  level: process.env.LOG_LEVEL || "info",
});

