export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};
