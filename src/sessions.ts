import { DEFAULT_LANGUAGE, type DialogState, type Language, type UserId, type UserSession } from "./types.js";

function defaultSession(userId: UserId): UserSession {
  return { userId, language: DEFAULT_LANGUAGE, dialogState: "idle" };
}

/**
 * In-memory per-user settings for the lifetime of the process.
 *
 * Reads hand out copies and never create entries; only the setters store a session.
 * Nothing is evicted.
 */
export class SessionStore {
  private readonly sessions = new Map<UserId, UserSession>();

  public get(userId: UserId): UserSession {
    const existing = this.sessions.get(userId);
    return existing ? { ...existing } : defaultSession(userId);
  }

  public has(userId: UserId): boolean {
    return this.sessions.has(userId);
  }

  public setLanguage(userId: UserId, language: Language): UserSession {
    return this.update(userId, { language });
  }

  public setDialogState(userId: UserId, dialogState: DialogState): UserSession {
    return this.update(userId, { dialogState });
  }

  public get size(): number {
    return this.sessions.size;
  }

  public clear(): void {
    this.sessions.clear();
  }

  private update(userId: UserId, patch: Partial<Omit<UserSession, "userId">>): UserSession {
    const next = { ...this.get(userId), ...patch };
    this.sessions.set(userId, next);
    return { ...next };
  }
}
