export type Logger = (message: string) => void;

export function createLogger(scope: string): Logger {
  return (message: string) => console.log(`[${scope}] ${message}`);
}

