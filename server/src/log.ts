const PREFIX = "[image-rater]";

export const log = {
  info: (...args: unknown[]) => console.log(PREFIX, ...args),
  error: (...args: unknown[]) => console.error(PREFIX, ...args),
};
