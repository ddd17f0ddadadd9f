export const TOOL_VERSION = '0.3.0';
