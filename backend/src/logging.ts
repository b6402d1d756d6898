import debug from 'debug';

export const NAMESPACES = {
  server: {
    main: 'parley:server',
    negotiate: 'parley:server:negotiate'
  },
  services: {
    negotiation: 'parley:services:negotiation'
  },
  agents: {
    orchestrator: 'parley:agents:orchestrator',
    summarize: 'parley:agents:summarize'
  },
  sessions: {
    chat: 'parley:sessions:chat'
  },
  llm: {
    client: 'parley:llm:client',
    custom: 'parley:llm:custom'
  },
  config: 'parley:config'
} as const;

export const createLogger = (namespace: string) => debug(namespace);

/**
 * Turn on namespaces from config unless DEBUG was already set in the environment.
 */
export function enableNamespaces(namespaces?: string): void {
  if (process.env.DEBUG || !namespaces) return;
  debug.enable(namespaces);
}
