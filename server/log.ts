export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
};

const formattedTime = () =>
  new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

export function log(message: string, source = "express") {
  console.log(`${formattedTime()} [${source}] ${message}`);
}

export function createLogger(source: string): Logger {
  return {
    info: (message) => log(message, source),
    warn: (message) => console.warn(`${formattedTime()} [${source}] ${message}`),
    error: (message, error) => {
      if (error === undefined) {
        console.error(`${formattedTime()} [${source}] ${message}`);
      } else {
        console.error(`${formattedTime()} [${source}] ${message}`, error);
      }
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
