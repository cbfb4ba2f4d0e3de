import { Agent, Dispatcher } from "undici";

const MAX_REDIRECTIONS = 5;

let defaultAgent: Agent | undefined;
let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      maxRedirections: MAX_REDIRECTIONS,
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Dispatcher {
  if (ignoreHttpsErrors) {
    return getInsecureAgent();
  }
  if (!defaultAgent) {
    defaultAgent = new Agent({ maxRedirections: MAX_REDIRECTIONS });
  }
  return defaultAgent;
}
