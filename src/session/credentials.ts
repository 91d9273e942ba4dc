import { DEFAULT_PORT } from './dsn.js';
import type { Credentials, Target } from '../control-plane/types.js';

export interface Prompter {
  ask(question: string): Promise<string>;
  askHidden(question: string): Promise<string>;
}

/**
 * Fills in the connection target from `preset` and prompts for whatever is
 * missing. The password is always prompted. Answers are not validated:
 * an empty host or service goes to the driver as is.
 */
export async function collectCredentials(
  prompter: Prompter,
  preset: Partial<Target> = {}
): Promise<Credentials> {
  const host = preset.host ?? (await prompter.ask('Enter Oracle Host: '));
  const port =
    preset.port ?? ((await prompter.ask(`Enter Port [default: ${DEFAULT_PORT}]: `)) || DEFAULT_PORT);
  const service = preset.service ?? (await prompter.ask('Enter Service Name/SID: '));
  const user = preset.user ?? (await prompter.ask('Enter Read-Only Username: '));
  const password = await prompter.askHidden(`Enter password for ${user}: `);

  return { host, port, service, user, password };
}
