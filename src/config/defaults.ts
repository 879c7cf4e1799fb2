export const CONFIG_FILE_NAMES = [
  '.archscriberc.json',
  '.archscriberc.yml',
  '.archscriberc.yaml',
];

export const DEFAULTS = {
  output: 'text' as const,
  prTimeout: 30,
  ghCommand: 'gh',
  verbose: false,
};
