/**
 * Logger handed to the custody client and uploader by their host.
 */
export type CustodyLogger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const noopLogger: CustodyLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
