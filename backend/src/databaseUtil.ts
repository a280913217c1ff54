import { readFile, writeFile } from "fs/promises";
import { Config } from "./config";
import { createLogger, errorMessage } from "./utils/logger";
import { generatePasswordHash, checkPasswordHash, bytesToHex, hexToBytes, parseIntOrUndefined } from "./utils/format";
import { connectPgWithRetry } from "./utils/servers";
import { IdIssueService } from "./services/idIssue";
import { UsersService } from "./services/users";
import { AuditLogService } from "./services/auditLog";
import { StorageConfigsService, redactConfig } from "./services/storageConfigs";
import {
  configsFromCsv,
  configsFromJson,
  configsToCsv,
  configsToJson,
  isTransferFormat,
} from "./services/configTransfer";

const logger = createLogger({ file: "databaseUtil" });

async function main() {
  const args = process.argv.slice(2);
  if (args.length < 1) {
    console.log(`Usage:
  databaseUtil hash <password> [hash]
  databaseUtil user-create <email> <nickname> <password> [admin]
  databaseUtil user-list [offset limit asc|desc]
  databaseUtil config-list <ownerId>
  databaseUtil config-export <csv|json> <localPath>
  databaseUtil config-import <csv|json> <localPath>
  databaseUtil audit-purge
`);
    process.exit(1);
  }
  const command = args[0];
  if (command === "hash") {
    const password = args.length > 1 ? args[1] : null;
    const hash = args.length > 2 ? args[2] : null;
    if (password && hash) {
      const array = hexToBytes(hash);
      if (array === null) {
        throw new Error("malformed hex text");
      }
      if (await checkPasswordHash(password, array)) {
        console.log("ok");
      } else {
        throw new Error("mismatch");
      }
    } else if (password) {
      const hex = bytesToHex(await generatePasswordHash(password));
      console.log(`'\\x${hex}'`);
    } else {
      throw new Error("password is required");
    }
    return;
  }

  const pgPool = await connectPgWithRetry();
  try {
    const ids = new IdIssueService(Config.ID_ISSUE_WORKER_ID);
    const audit = new AuditLogService(pgPool, ids);
    const registry = new StorageConfigsService(pgPool, ids, audit);
    switch (command) {
      case "user-create": {
        if (args.length < 4) throw new Error("email, nickname and password are required");
        const users = new UsersService(pgPool, ids, audit);
        const user = await users.createUser({
          email: args[1],
          nickname: args[2],
          password: args[3],
          isAdmin: args[4] === "admin",
        });
        console.log(JSON.stringify(user, null, 2));
        break;
      }
      case "user-list": {
        const users = new UsersService(pgPool, ids, audit);
        const list = await users.listUsers({
          offset: parseIntOrUndefined(args[1]),
          limit: parseIntOrUndefined(args[2]),
          order: args[3] === "asc" ? "asc" : "desc",
        });
        console.log(JSON.stringify(list, null, 2));
        break;
      }
      case "config-list": {
        if (!args[1]) throw new Error("ownerId is required");
        const configs = await registry.listConfigs(args[1]);
        console.log(JSON.stringify(configs, null, 2));
        break;
      }
      case "config-export": {
        const format = args[1];
        if (!isTransferFormat(format)) throw new Error(`unknown format: ${format}`);
        if (!args[2]) throw new Error("localPath is required");
        const configs = await registry.exportAllConfigs();
        await writeFile(args[2], format === "csv" ? configsToCsv(configs) : configsToJson(configs));
        console.log(JSON.stringify(configs.map(redactConfig), null, 2));
        break;
      }
      case "config-import": {
        const format = args[1];
        if (!isTransferFormat(format)) throw new Error(`unknown format: ${format}`);
        if (!args[2]) throw new Error("localPath is required");
        const text = await readFile(args[2], "utf8");
        const records = format === "csv" ? configsFromCsv(text) : configsFromJson(text);
        const result = await registry.importConfigs(records);
        console.log(JSON.stringify(result));
        break;
      }
      case "audit-purge": {
        const purged = await audit.purgeOldAuditLogs();
        console.log(JSON.stringify({ purged }));
        break;
      }
      default: {
        throw new Error(`Unknown command: ${command}`);
      }
    }
  } finally {
    await pgPool.end();
    logger.info("disconnected");
  }
}

main().catch((e) => {
  logger.error(`Fatal error: ${errorMessage(e)}`);
  process.exit(1);
});
