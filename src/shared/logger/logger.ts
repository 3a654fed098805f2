import pino from "pino";

const defaultLevel = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (process.env.NODE_ENV === "test") {
    return "silent";
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
};

export const logger = pino({
  name: "company-research",
  level: defaultLevel(),
});

export type Logger = typeof logger;

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
