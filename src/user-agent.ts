export const VERSION = '0.1.0';

/** User-Agent header sent with every request */
export function getUserAgent(): string {
  return `lakequery-client (version ${VERSION}; node ${process.versions.node})`;
}
