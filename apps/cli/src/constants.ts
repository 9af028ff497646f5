export const PRODUCT_NAME = 'Agent Shell';
export const CLI_COMMAND = 'agentshell';
