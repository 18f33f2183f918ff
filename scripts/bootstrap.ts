import "reflect-metadata";
import * as dotenv from "dotenv";
import { InjectorService } from "@tsed/di";
import { $log } from "@tsed/logger";
import { ConfigService } from "../src/services/ConfigService";
import { DatabaseService } from "../src/services/DatabaseService";

dotenv.config();

export interface ScriptContext {
  injector: InjectorService;
  config: ConfigService;
  database: DatabaseService;
}

export async function bootstrap(): Promise<ScriptContext> {
  const injector = new InjectorService();
  await injector.load();

  const config = injector.invoke<ConfigService>(ConfigService);
  $log.level = config.get("logLevel");

  return { injector, config, database: injector.invoke<DatabaseService>(DatabaseService) };
}

export function hasFlag(name: string): boolean {
  return process.argv.slice(2).includes(`--${name}`);
}

export function readOption(name: string): string | undefined {
  const args = process.argv.slice(2);
  const inline = args.find((arg) => arg.startsWith(`--${name}=`));
  if (inline) return inline.slice(name.length + 3);

  const index = args.indexOf(`--${name}`);
  return index >= 0 ? args[index + 1] : undefined;
}

export function banner(title: string): void {
  console.log(`${title}\n`);
  console.log("=".repeat(50));
}

/** Runs a script body, closing the database whatever happens and exiting 1 on failure. */
export function run(main: (context: ScriptContext) => Promise<void>): void {
  let context: ScriptContext | null = null;

  const execute = async () => {
    context = await bootstrap();
    await main(context);
    await context.database.closeConnections();
  };

  execute().catch(async (error) => {
    console.error("Fatal error:", error);
    try {
      await context?.database.closeConnections();
    } catch (closeError) {
      console.error("Error closing DB connections", closeError);
    }
    process.exit(1);
  });
}
