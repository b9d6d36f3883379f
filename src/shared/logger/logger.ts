import pino from "pino";

const level = (): string => {
  if (process.env.NODE_ENV === "test") {
    return "silent";
  }

  return process.env.NODE_ENV === "production" ? "info" : "debug";
};

export const logger = pino({
  name: "portfolio-insights",
  level: level(),
});
