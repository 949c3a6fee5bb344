/**
 * Reporting capability handed to every core component. Components never
 * write to the console themselves.
 */
export interface Reporter {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export const silentReporter: Reporter = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
