export interface TrackerIo {
  readonly log: (message: string) => void;
  readonly error: (message: string) => void;
}

export const consoleIo: TrackerIo = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};
