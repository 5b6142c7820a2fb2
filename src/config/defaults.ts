export const CONFIG_FILE_NAMES = [
  '.twinpanerc.json',
  '.twinpanerc.yml',
  '.twinpanerc.yaml',
];

export const DEFAULTS = {
  lookahead: 3,
  binaryProbeBytes: 8192,
  closeGuard: 'two-step' as const,
  preserveTimestamps: true,
  showHidden: true,
  output: 'text' as const,
  logLevel: 'info' as const,
};
