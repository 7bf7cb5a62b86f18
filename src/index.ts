#!/usr/bin/env node
import { logger } from "./logger";
import { startApp } from "./app";

function argValue(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  if (i >= 0) return args[i + 1];
  const inline = args.find((a) => a.startsWith(`${flag}=`));
  return inline?.slice(flag.length + 1);
}

startApp({ configPath: argValue(process.argv.slice(2), "--config") }).catch((err: unknown) => {
  logger.error("Erreur fatale:", err);
  process.exit(1);
});
