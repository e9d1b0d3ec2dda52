export const ERROR_CODES = {
  E_USER_MISUSE: "E_USER_MISUSE",
  E_STORE_UNREADABLE: "E_STORE_UNREADABLE",
  E_VCS_NO_REMOTE: "E_VCS_NO_REMOTE",
  E_VCS_COMMIT_FAILED: "E_VCS_COMMIT_FAILED",
  E_VCS_PUSH_FAILED: "E_VCS_PUSH_FAILED",
  E_CONFIGURATION: "E_CONFIGURATION",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
