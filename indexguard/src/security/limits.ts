export const MAX_CMD_BUFFER_SIZE = 50 * 1024 * 1024; // 50MB
export const MAX_DIFF_SIZE = 10 * 1024 * 1024; // 10MB
