import pkg from "../../package.json" with { type: "json" };

export const VERSION: string = pkg.version;

/** Default User-Agent sent with every request */
export const DEFAULT_USER_AGENT = `hubget/${VERSION}`;
