// Identifiers

/** Canonical campaign id: the first topic id listed for a campaign, as a string. */
export type CampaignId = string;
export type UserId = string;

/** Typed composite key for everything tracked per (campaign, user). */
export interface PlayerKey {
  campaignId: CampaignId;
  userId: UserId;
}

// Inbound events

export interface ChatUser {
  id: UserId;
  firstName: string;
  lastName: string;
  username: string;
  isBot: boolean;
}

export interface ChatMessage {
  chatId: number;
  /** Forum thread the message was posted in; null for the general thread. */
  threadId: number | null;
  from: ChatUser;
  text: string;
  /** Platform timestamp, epoch milliseconds. */
  sentAt: number;
}

export interface ChoiceCallback {
  id: string;
  data: string;
  from: ChatUser;
  chatId: number | null;
  messageId: number | null;
}

export interface ChatUpdate {
  updateId: number;
  message?: ChatMessage;
  callback?: ChoiceCallback;
}

// Outbound

export interface ChoiceOption {
  label: string;
  data: string;
}

/**
 * Outbound notification primitives. Every call reports success; nothing
 * here throws into a check.
 */
export interface NotificationSink {
  send(chatId: number, threadId: number, text: string): Promise<boolean>;
  /** Returns the posted message id, or null when delivery failed. */
  sendWithChoices(chatId: number, threadId: number, text: string, options: ChoiceOption[]): Promise<number | null>;
  /** Replace a message's text (HTML) and drop its choice buttons. */
  edit(chatId: number, messageId: number, text: string): Promise<boolean>;
  acknowledge(callbackId: string, text: string): Promise<boolean>;
}

export interface ChatTransport extends NotificationSink {
  fetchUpdates(offset: number): Promise<ChatUpdate[]>;
  close(): Promise<void>;
}

// Snapshot entities

export interface TopicActivity {
  lastMessageTime: string; // ISO 8601
  lastUserName: string;
  lastUserId: UserId;
}

export interface PlayerRecord {
  userId: UserId;
  firstName: string;
  lastName: string;
  username: string;
  lastPostTime: string; // ISO 8601
  /** Highest ladder rung (in weeks) already sent since the last post; 0 = none. */
  lastWarnedWeek: number;
  lastWarnedAt: string | null;
}

export interface RemovedPlayer {
  removedAt: string;
  firstName: string;
  username: string;
  lastPostTime: string;
}

export type CombatPhase = 'players' | 'enemies';

export interface CombatLogEntry {
  round: number;
  text: string;
  at: string;
}

export interface CombatState {
  active: boolean;
  round: number;
  phase: CombatPhase;
  phaseStartedAt: string;
  startedAt: string;
  /** User ids that have posted during the current players-phase. */
  acted: UserId[];
  lastPingAt: string | null;
  /** Set once the "everyone has acted" notice went out for this phase. */
  allActedNotified: boolean;
  enemies: string[];
  log: CombatLogEntry[];
}

export interface PendingAward {
  messageId: number;
  winnerUserId: UserId;
  options: string[];
  baseMessage: string;
  postedAt: string;
}

export interface PauseRecord {
  pausedAt: string;
  reason: string;
}

/** Interval-gated check families: campaign id -> last fired ISO time. */
export type IntervalFamily =
  | 'topicAlert'
  | 'roster'
  | 'award'
  | 'pace'
  | 'recruitment'
  | 'paceDrop';

/** Interval-gated checks that post once for the whole group. */
export type GlobalIntervalFamily = 'leaderboard' | 'digest';

export interface DebounceState {
  intervals: Record<IntervalFamily, Record<CampaignId, string>>;
  global: Record<GlobalIntervalFamily, string | null>;
  /** campaign -> user -> highest streak milestone celebrated. */
  streaks: Record<CampaignId, Record<UserId, number>>;
  /** campaign -> anniversary year -> fired ISO time. */
  anniversaries: Record<CampaignId, Record<string, string>>;
  /** Highest message-count step celebrated per campaign, and across all campaigns. */
  messageSteps: {
    campaigns: Record<CampaignId, number>;
    global: number;
  };
  /** campaign -> last post time the silence alert went out for. */
  silence: Record<CampaignId, string>;
  lastArchivedWeek: string | null;
}

export interface ActivitySnapshot {
  offset: number;
  topics: Record<CampaignId, TopicActivity>;
  players: Record<CampaignId, Record<UserId, PlayerRecord>>;
  removedPlayers: Record<CampaignId, Record<UserId, RemovedPlayer>>;
  messageCounts: Record<CampaignId, Record<UserId, number>>;
  /** Raw post timestamps (ISO 8601), append-only within a run. */
  postTimestamps: Record<CampaignId, Record<UserId, string[]>>;
  combat: Record<CampaignId, CombatState>;
  pendingAwards: Record<CampaignId, PendingAward>;
  paused: Record<CampaignId, PauseRecord>;
  debounce: DebounceState;
}

// Configuration

export type FeatureName =
  | 'alerts'
  | 'warnings'
  | 'roster'
  | 'award'
  | 'pace'
  | 'streaks'
  | 'anniversary'
  | 'milestones'
  | 'combat'
  | 'recruitment'
  | 'paceDrop'
  | 'silence';

export interface CampaignConfig {
  name: string;
  /** Every thread belonging to the campaign; the first one is canonical. */
  topicIds: number[];
  outputTopicId: number;
  created?: string; // YYYY-MM-DD
  features: Partial<Record<FeatureName, boolean>>;
  characters: Record<UserId, string>;
  gmUserIds?: UserId[];
}

export interface Settings {
  burstWindowMinutes: number;
  warnWeeks: readonly number[];
  removeWeeks: number;
  alertAfterHours: number;
  rosterIntervalDays: number;
  awardIntervalDays: number;
  awardMinSessions: number;
  awardChoiceExpiryHours: number;
  paceIntervalDays: number;
  leaderboardIntervalDays: number;
  digestIntervalDays: number;
  combatPingHours: number;
  recruitmentIntervalDays: number;
  requiredPlayers: number;
  paceDropIntervalDays: number;
  paceDropMinPrevious: number;
  paceDropRatio: number;
  silenceAlertHours: number;
  streakMilestones: readonly number[];
  campaignMessageStep: number;
  globalMessageStep: number;
  retentionDays: number;
}

export interface BotConfig {
  /** Reload token; derived lookup tables are cached against it. */
  version: number;
  groupId: number;
  gmUserIds: UserId[];
  botUserId: UserId | null;
  leaderboardTopicId: number | null;
  digestTopicId: number | null;
  campaigns: CampaignConfig[];
  settings: Readonly<Settings>;
}

// Derived analytics

export type Trend = 'no-data' | 'new' | 'up' | 'down' | 'steady';

export interface PaceSplit {
  gmThisWeek: number;
  gmLastWeek: number;
  playerThisWeek: number;
  playerLastWeek: number;
}

export interface WeeklyArchiveEntry {
  campaign: string;
  week: string;
  gmPosts: number;
  playerPosts: number;
  totalPosts: number;
  playerAvgGapHours: number | null;
  activePlayers: number;
  topPlayers: Record<string, number>;
}

export type WeeklyArchive = Record<string, WeeklyArchiveEntry>;
