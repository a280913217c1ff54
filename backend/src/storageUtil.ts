import { Config } from "./config";
import path from "path";
import { createReadStream, createWriteStream } from "fs";
import { stat } from "fs/promises";
import { pipeline } from "stream/promises";
import { lookup as mimeLookup } from "mime-types";
import { connectPgWithRetry } from "./utils/servers";
import { createLogger, errorMessage } from "./utils/logger";
import { parseIntOrUndefined } from "./utils/format";
import { IdIssueService } from "./services/idIssue";
import { AuditLogService } from "./services/auditLog";
import { ObjectStoreCache } from "./services/storageFactory";
import { StorageConfigsService } from "./services/storageConfigs";
import { TransferService } from "./services/transfer";

const logger = createLogger({ file: "storageUtil" });

type FilePath = { ownerId: string; configId?: string; filename: string };

function parseFilePath(p: string): FilePath {
  const m = /^([^@:]+)(?:@([^:]+))?:\/(.*)$/.exec(p);
  if (!m) throw new Error(`invalid file path: ${p}`);
  return { ownerId: m[1], configId: m[2], filename: m[3] };
}

async function main() {
  const args = process.argv.slice(2);
  if (args.length < 2) {
    console.error(`Usage:
  storageUtil probe <ownerId[@configId]:/>
  storageUtil list <ownerId[@configId]:/> [page pageSize]
  storageUtil load <ownerId[@configId]:/filename> localPath
  storageUtil save <ownerId[@configId]:/filename> localPath
  storageUtil delete <ownerId[@configId]:/filename>
`);
    process.exit(1);
  }
  const command = args[0];
  const target = parseFilePath(args[1]);
  const localPath = args[2];

  const pgPool = await connectPgWithRetry();
  try {
    const ids = new IdIssueService(Config.ID_ISSUE_WORKER_ID);
    const audit = new AuditLogService(pgPool, ids);
    const stores = new ObjectStoreCache(Config.STORE_CACHE_SIZE);
    const registry = new StorageConfigsService(pgPool, ids, audit, stores);
    const transfer = new TransferService(registry, audit, stores);
    switch (command) {
      case "probe": {
        const config = target.configId
          ? await registry.getOwnedConfig(target.ownerId, target.configId)
          : await registry.getDefaultConfig(target.ownerId);
        await transfer.verifyConnectivity(config);
        console.log(`ok: ${config.id} (${config.displayName})`);
        break;
      }
      case "list": {
        const result = await transfer.listFiles({
          ownerId: target.ownerId,
          configId: target.configId,
          page: parseIntOrUndefined(args[2]),
          pageSize: parseIntOrUndefined(args[3]),
        });
        console.log(JSON.stringify(result, null, 2));
        break;
      }
      case "load": {
        if (!localPath) throw new Error("localPath required");
        const download = await transfer.downloadFile({
          ownerId: target.ownerId,
          configId: target.configId,
          key: target.filename,
        });
        await pipeline(download.body, createWriteStream(localPath));
        console.log(`saved -> ${localPath} (${download.contentLength ?? "?"} bytes)`);
        break;
      }
      case "save": {
        if (!localPath) throw new Error("localPath required");
        const info = await stat(localPath);
        const filename = target.filename || path.basename(localPath);
        const result = await transfer.uploadFile({
          ownerId: target.ownerId,
          configId: target.configId,
          filename,
          body: createReadStream(localPath),
          size: info.size,
          contentType: mimeLookup(filename) || "application/octet-stream",
        });
        console.log(JSON.stringify(result, null, 2));
        break;
      }
      case "delete": {
        await transfer.deleteFile({
          ownerId: target.ownerId,
          configId: target.configId,
          key: target.filename,
        });
        console.log("deleted");
        break;
      }
      default: {
        throw new Error(`Unknown command: ${command}`);
      }
    }
  } finally {
    await pgPool.end();
  }
}

main().catch((e) => {
  logger.error(`Fatal error: ${errorMessage(e)}`);
  process.exit(1);
});
