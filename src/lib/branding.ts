export const CLI_NAME = 'hostprep';

export const CONFIG_FILE_NAME = 'hostprep.config.json';
export const CONFIG_FILE_CANDIDATES = [CONFIG_FILE_NAME, '.hostprep.json'] as const;

export const DEFAULT_LOG_FILE = 'install.log';
