import { createHandler } from "../../handlers/create-handler";
import type { LogHandler } from "../../handlers/handler";
import { getConfig, handlerConfigFromSettings, type Settings } from "../../lib/config";

export async function getConfiguredHandler(): Promise<{
  handler: LogHandler;
  settings: Settings;
}> {
  const settings = await getConfig();
  return { handler: createHandler(handlerConfigFromSettings(settings)), settings };
}
