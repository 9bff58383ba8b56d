// ============================================================================
// @statemap/core — Well-Known Matrix State Event Types
// ============================================================================

/** The creation event type */
export const TYPE_CREATE = 'm.room.create';
/** The power levels event type */
export const TYPE_POWER_LEVELS = 'm.room.power_levels';
/** The join rules event type */
export const TYPE_JOIN_RULES = 'm.room.join_rules';
/** The history visibility event type */
export const TYPE_HISTORY_VISIBILITY = 'm.room.history_visibility';
/** The name event type */
export const TYPE_NAME = 'm.room.name';
/** The topic event type */
export const TYPE_TOPIC = 'm.room.topic';
/** The room avatar event type */
export const TYPE_AVATAR = 'm.room.avatar';
/** The guest access event type */
export const TYPE_GUEST_ACCESS = 'm.room.guest_access';
/** The canonical alias event type */
export const TYPE_CANONICAL_ALIAS = 'm.room.canonical_alias';
/** The related groups event type */
export const TYPE_RELATED_GROUPS = 'm.room.related_groups';
/** The encryption event type */
export const TYPE_ENCRYPTION = 'm.room.encryption';

/** The member event type, keyed by user ID */
export const TYPE_MEMBER = 'm.room.member';
/** The aliases event type, keyed by server name */
export const TYPE_ALIASES = 'm.room.aliases';
/** The third party invite event type, keyed by invite token */
export const TYPE_THIRD_PARTY_INVITE = 'm.room.third_party_invite';

/**
 * Event types that are normally sent with an empty state key.
 */
export const WELL_KNOWN_EMPTY_KEY_TYPES = [
  TYPE_CREATE,
  TYPE_POWER_LEVELS,
  TYPE_JOIN_RULES,
  TYPE_HISTORY_VISIBILITY,
  TYPE_NAME,
  TYPE_TOPIC,
  TYPE_AVATAR,
  TYPE_GUEST_ACCESS,
  TYPE_CANONICAL_ALIAS,
  TYPE_RELATED_GROUPS,
  TYPE_ENCRYPTION,
] as const;

export type WellKnownEmptyKeyType = (typeof WELL_KNOWN_EMPTY_KEY_TYPES)[number];

/**
 * Every well-known state event type. The shared interner is seeded with
 * these, in this order.
 */
export const WELL_KNOWN_TYPES = [
  ...WELL_KNOWN_EMPTY_KEY_TYPES,
  TYPE_MEMBER,
  TYPE_ALIASES,
  TYPE_THIRD_PARTY_INVITE,
] as const;

const EMPTY_KEY_TYPE_SET: ReadonlySet<string> = new Set(WELL_KNOWN_EMPTY_KEY_TYPES);

export function isWellKnownEmptyKeyType(eventType: string): eventType is WellKnownEmptyKeyType {
  return EMPTY_KEY_TYPE_SET.has(eventType);
}
