export type EngineLogger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const consoleLogger: EngineLogger = {
  debug: (message) => console.debug(message),
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

const ignore = (_message: string): void => {};

export const silentLogger: EngineLogger = {
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
};
