import { runMigrateCommand } from "./commands/migrate_command";
import { createLogger } from "./logging/logger";

runMigrateCommand(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    createLogger().error({ evt: "migrate.fatal", error: String(err) }, "migrate.fatal");
    process.exitCode = 1;
  });
