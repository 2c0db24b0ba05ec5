export const DEFAULT_TIMEZONE = "Europe/Berlin";
export const DEFAULT_CITY = "Bielefeld";

/** JSON-LD `@type` values treated as events. */
export const JSON_LD_EVENT_TYPES = ["Event", "MusicEvent", "TheaterEvent", "DanceEvent"] as const;

/** Days a year-less date may lie in the past before it is moved to next year. */
export const YEAR_ROLLOVER_PAST_DAYS = 60;
