export interface ProvisionLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: ProvisionLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message)
};

export function banner(title: string): string[] {
  const rule = '='.repeat(50);
  return [rule, title, rule];
}
