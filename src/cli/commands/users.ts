import { Command } from "clipanion";
import { loadUserProfiles } from "../../config/credentials.js";
import { loadConfig } from "../../config/loader.js";
import { getLedgerPath } from "../../config/paths.js";
import { reportFailure } from "../shared.js";

export class UsersCommand extends Command {
  static override paths = [["users"]];

  static override usage = Command.Usage({
    description: "List user profiles configured in the environment",
    details: `
      Profiles come from TRANSLATE_USER_<ID>_NAME, TRANSLATE_USER_<ID>_KEY and
      the optional TRANSLATE_USER_<ID>_BACKUP_KEY variables.
    `,
    examples: [["List users", "cjk-translate users"]],
  });

  async execute(): Promise<void> {
    try {
      const config = loadConfig();
      const profiles = [...loadUserProfiles(process.env).values()].sort((a, b) =>
        a.name.localeCompare(b.name),
      );

      if (profiles.length === 0) {
        this.context.stdout.write("No users configured.\n");
        return;
      }

      for (const profile of profiles) {
        const key = process.env[profile.keyVar] ? "set" : "missing";
        const backup = process.env[profile.backupKeyVar] ? "set" : "missing";
        this.context.stdout.write(
          `${profile.name} (--user ${profile.safeName})\n` +
            `  key: ${key}, backup key: ${backup}\n` +
            `  ledger: ${getLedgerPath(config, profile.safeName)}\n`,
        );
      }
    } catch (err) {
      reportFailure(this.context, err);
    }
  }
}
