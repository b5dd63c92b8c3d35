// TableInstance constants

export const TABLE_CONSTANTS = {
  ID_LENGTH: 12,
  MIN_PLAYERS_TO_START: 2,

  // Message log
  MAX_MESSAGE_LOG: 50,
} as const;
