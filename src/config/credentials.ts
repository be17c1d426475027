import { TranslatorError } from "../errors.js";

const PROFILE_NAME_PATTERN = /^TRANSLATE_USER_(.+)_NAME$/;
const DEFAULT_LEDGER_NAME = "default";

export interface UserProfile {
  readonly id: string;
  readonly name: string;
  /** File-system safe form of the name, also used as the ledger file name. */
  readonly safeName: string;
  readonly keyVar: string;
  readonly backupKeyVar: string;
}

export interface ResolvedCredentials {
  readonly apiKey: string;
  readonly displayName: string;
  readonly ledgerName: string;
  readonly usedBackupKey: boolean;
}

type Env = Record<string, string | undefined>;

export function makeSafeFileName(name: string): string {
  return name
    .replace(/[^\w\-.]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}

/**
 * Collect user profiles declared as TRANSLATE_USER_<ID>_NAME with a matching
 * TRANSLATE_USER_<ID>_KEY variable.
 */
export function loadUserProfiles(env: Env): Map<string, UserProfile> {
  const profiles = new Map<string, UserProfile>();

  for (const [key, value] of Object.entries(env)) {
    const match = PROFILE_NAME_PATTERN.exec(key);
    if (!match?.[1] || !value) continue;

    const id = match[1];
    const keyVar = `TRANSLATE_USER_${id}_KEY`;
    if (!(keyVar in env)) continue;

    const safeName = makeSafeFileName(value);
    profiles.set(safeName, {
      id,
      name: value,
      safeName,
      keyVar,
      backupKeyVar: `TRANSLATE_USER_${id}_BACKUP_KEY`,
    });
  }

  return profiles;
}

export function findUserProfile(
  profiles: Map<string, UserProfile>,
  user: string,
): UserProfile | undefined {
  const direct = profiles.get(user);
  if (direct) return direct;

  const lowered = user.toLowerCase();
  for (const profile of profiles.values()) {
    if (profile.name.toLowerCase() === lowered) return profile;
  }
  return undefined;
}

export function resolveCredentials(
  env: Env,
  options: { user?: string; configApiKey?: string },
): ResolvedCredentials {
  if (!options.user) {
    const apiKey = options.configApiKey ?? env["TRANSLATE_API_KEY"];
    if (!apiKey) {
      throw new TranslatorError(
        "config",
        "No API key configured. Set TRANSLATE_API_KEY, backend.apiKey in the config file, or pass --user.",
      );
    }
    return {
      apiKey,
      displayName: DEFAULT_LEDGER_NAME,
      ledgerName: DEFAULT_LEDGER_NAME,
      usedBackupKey: false,
    };
  }

  const profiles = loadUserProfiles(env);
  const profile = findUserProfile(profiles, options.user);

  if (!profile) {
    const names = [...profiles.values()].map((p) => p.name);
    const message =
      names.length > 0
        ? `User '${options.user}' not found. Available users: ${names.join(", ")} ` +
          `(CLI names: ${[...profiles.keys()].join(", ")})`
        : "No users configured. Example: TRANSLATE_USER_1_NAME=Jane Doe, TRANSLATE_USER_1_KEY=<api key>";
    throw new TranslatorError("config", message);
  }

  const primary = env[profile.keyVar];
  if (primary) {
    return {
      apiKey: primary,
      displayName: profile.name,
      ledgerName: profile.safeName,
      usedBackupKey: false,
    };
  }

  const backup = env[profile.backupKeyVar];
  if (backup) {
    return {
      apiKey: backup,
      displayName: profile.name,
      ledgerName: profile.safeName,
      usedBackupKey: true,
    };
  }

  throw new TranslatorError(
    "config",
    `No API key found for user '${profile.name}'. Set ${profile.keyVar}.`,
  );
}

/** Ledger file name for a user, without requiring their key to be set. */
export function resolveLedgerName(env: Env, user?: string): string {
  if (!user) return DEFAULT_LEDGER_NAME;
  const profile = findUserProfile(loadUserProfiles(env), user);
  if (!profile) {
    throw new TranslatorError("config", `User '${user}' not found. Run "cjk-translate users" to list users.`);
  }
  return profile.safeName;
}
