/** Options accepted before any command. */
export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  json?: boolean;
}
