// Where the badge is written when --output is not given
export const DEFAULT_OUTPUT_PATH = "assets/monkeytype-badge.svg";
// Placeholder substituted in the scoreboard URL template
export const USERNAME_PLACEHOLDER = "{username}";
// Right-hand text when the scoreboard gave nothing usable
export const NO_DATA_LABEL = "no data";

export const BADGE_LABEL = "MonkeyType";
export const BADGE_HEIGHT = 20;
// Wide enough for BADGE_LABEL at font-size 11
export const BADGE_LEFT_WIDTH = 72;
export const BADGE_RIGHT_MIN_WIDTH = 60;
// Rough rendered width of one character, and the padding around the value text
export const BADGE_CHAR_WIDTH = 7;
export const BADGE_RIGHT_PADDING = 20;
