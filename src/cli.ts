import { serve } from '@hono/node-server';
import {
  AI_PROVIDERS,
  APP_VERSION,
  configPath,
  getActiveProvider,
  hasApiKey,
  isAIProvider,
  loadSettings,
  setActiveProvider,
  setProviderApiKey,
  validateApiKey,
} from './config.js';
import { ValidationError, isReplicantError } from './errors.js';
import { createGameService, type GameService } from './game.js';
import { logger } from './logger.js';
import { getModel } from './providers.js';
import { createApp } from './server.js';
import { flattenTree } from './tree.js';

// ANSI colors
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';
const red = '\x1b[31m';
const green = '\x1b[32m';
const yellow = '\x1b[33m';
const cyan = '\x1b[36m';

export function showHelp(): void {
  console.log(`
${bold}${cyan}REDDIT OR REPLICANT${reset} ${dim}v${APP_VERSION}${reset} - spot the synthetic comments

${bold}Usage:${reset}
  replicant serve [--port N]              Start the HTTP API
  replicant submit <url> [--overwrite]    Build a round from a Reddit post
  replicant show <id>                     Print a stored round with provenance
  replicant list [--subreddit name] [--all]
                                          List rounds (--all includes deleted)
  replicant delete <id>                   Hide a round from players
  replicant restore <id>                  Bring a deleted round back
  replicant stats                         Guessing accuracy across all players
  replicant config                        Show provider settings
  replicant config provider <name>        Switch provider (${AI_PROVIDERS.join(', ')})
  replicant config key <provider> <key>   Store an API key
  replicant help                          Show this help

${bold}Environment:${reset}
  PORT, DATABASE_URL, DATABASE_AUTH_TOKEN, ADMIN_TOKEN,
  GENERATION_TIMEOUT_MS, REDDIT_TIMEOUT_MS, REPLICANT_HOME,
  REPLICANT_LOG_LEVEL, ANTHROPIC_API_KEY / OPENAI_API_KEY / GOOGLE_API_KEY / XAI_API_KEY
`);
}

function flagValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

function requireId(value: string | undefined): number {
  if (!value || !/^\d+$/.test(value)) {
    throw new ValidationError('Expected a numeric post id');
  }
  return Number(value);
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError(`Invalid port: ${value}`);
  }
  return port;
}

async function withService<T>(fn: (service: GameService) => Promise<T>): Promise<T> {
  const service = await createGameService(loadSettings());
  try {
    return await fn(service);
  } finally {
    service.close();
  }
}

function percent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

// ============================================================================
// COMMANDS
// ============================================================================

async function runServe(portArg: string | undefined): Promise<void> {
  const settings = loadSettings();
  const port = parsePort(portArg) ?? settings.port;

  if (!hasApiKey()) {
    logger.warn(`No API key for ${getActiveProvider()}; submissions will fail until one is configured`);
  }
  if (!settings.adminToken) {
    logger.warn('ADMIN_TOKEN is not set; admin routes are disabled');
  }

  const service = await createGameService(settings);
  const app = createApp(service, { adminToken: settings.adminToken, corsOrigins: settings.corsOrigins });
  const server = serve({ fetch: app.fetch, port }, info => {
    logger.info(`Listening on http://localhost:${info.port}`);
  });

  const shutdown = (): void => {
    logger.info('Shutting down');
    server.close();
    service.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function runSubmit(url: string | undefined, overwrite: boolean): Promise<void> {
  if (!url) {
    throw new ValidationError('Usage: replicant submit <url> [--overwrite]');
  }
  console.log(`\n  ${dim}Fetching and generating, this can take a minute...${reset}`);
  const result = await withService(service => service.submitPost(url, { overwrite }));
  console.log(`\n  ${green}✓${reset} Stored post ${bold}${result.id}${reset}`);
  console.log(`    ${result.stats.real} real, ${result.stats.synthetic} synthetic ` +
    `(${result.stats.topLevelSynthetic} top-level, ${result.stats.replySynthetic} replies)`);
  if (result.evaluation) {
    const e = result.evaluation;
    console.log(`    Judge: ${bold}${e.overall}${reset}/10 overall ` +
      `${dim}(mixed ${e.mixedReality}, diversity ${e.diversity}, tone ${e.appropriateness})${reset}`);
  }
  console.log('');
}

async function runShow(idArg: string | undefined): Promise<void> {
  const id = requireId(idArg);
  const stored = await withService(service => service.getPost(id));

  console.log(`\n${bold}${stored.post.title}${reset}`);
  console.log(`${dim}r/${stored.subreddit} · u/${stored.post.author} · ${stored.redditUrl}${reset}\n`);

  for (const node of flattenTree(stored.post.comments)) {
    const indent = '  '.repeat(node.depth + 1);
    const label = node.isSynthetic ? `${yellow}[replicant]${reset}` : `${green}[reddit]${reset}`;
    const text = node.content.replace(/\s+/g, ' ');
    const preview = text.length > 80 ? `${text.slice(0, 77)}...` : text;
    console.log(`${indent}${label} ${dim}${node.id}${reset} u/${node.author} (${node.score})`);
    console.log(`${indent}  ${preview}`);
  }
  console.log('');
}

async function runList(subreddit: string | undefined, includeDeleted: boolean): Promise<void> {
  const posts = await withService(service => service.listPosts({ subreddit, includeDeleted }));
  if (posts.length === 0) {
    console.log(`\n  ${dim}No posts yet. Submit one with: replicant submit <url>${reset}\n`);
    return;
  }

  console.log('');
  for (const post of posts) {
    const deleted = post.isDeleted ? ` ${red}(deleted)${reset}` : '';
    console.log(`  ${bold}${String(post.id).padStart(4)}${reset}  ${cyan}r/${post.subreddit}${reset}  ${post.title}${deleted}`);
    console.log(`        ${dim}${post.aiCount}/${post.totalCount} synthetic · ${post.createdAt}${reset}`);
  }
  console.log('');
}

async function runDelete(idArg: string | undefined): Promise<void> {
  const id = requireId(idArg);
  const changed = await withService(service => service.deletePost(id));
  console.log(changed ? `\n  ${green}✓${reset} Post ${id} deleted\n` : `\n  ${dim}Post ${id} was already deleted${reset}\n`);
}

async function runRestore(idArg: string | undefined): Promise<void> {
  const id = requireId(idArg);
  const changed = await withService(service => service.restorePost(id));
  console.log(changed ? `\n  ${green}✓${reset} Post ${id} restored\n` : `\n  ${dim}Post ${id} was not deleted${reset}\n`);
}

async function runStats(): Promise<void> {
  const stats = await withService(service => service.stats());
  console.log(`
${bold}Game stats${reset}
  Posts:              ${stats.posts}
  Players:            ${stats.users}
  Guesses:            ${stats.overall.guesses} (${percent(stats.overall.accuracy)} correct)
  On replicants:      ${stats.synthetic.guesses} (${percent(stats.synthetic.accuracy)} caught)
  On real comments:   ${stats.real.guesses} (${percent(stats.real.accuracy)} correct)
  Flagged obvious:    ${stats.flaggedObvious}
`);
}

function runConfig(args: string[]): void {
  const sub = args[0];

  if (sub === 'provider') {
    const name = args[1];
    if (!name || !isAIProvider(name)) {
      throw new ValidationError(`Provider must be one of: ${AI_PROVIDERS.join(', ')}`);
    }
    setActiveProvider(name);
    console.log(`\n  ${green}✓${reset} Provider set to ${bold}${name}${reset}\n`);
    return;
  }

  if (sub === 'key') {
    const provider = args[1];
    const key = args[2];
    if (!provider || !isAIProvider(provider) || !key) {
      throw new ValidationError('Usage: replicant config key <provider> <key>');
    }
    if (!validateApiKey(provider, key)) {
      console.log(`  ${yellow}!${reset} Key format not recognized for ${provider}, saving anyway`);
    }
    setProviderApiKey(provider, key);
    console.log(`\n  ${green}✓${reset} Saved ${provider} key to ${configPath()}\n`);
    return;
  }

  if (sub !== undefined) {
    throw new ValidationError(`Unknown config command: ${sub}`);
  }

  const provider = getActiveProvider();
  console.log(`
${bold}Provider settings${reset} ${dim}(${configPath()})${reset}
`);
  for (const p of AI_PROVIDERS) {
    const marker = p === provider ? `${green}●${reset}` : `${dim}○${reset}`;
    const key = hasApiKey(p) ? `${green}key set${reset}` : `${dim}no key${reset}`;
    console.log(`  ${marker} ${p.padEnd(10)} ${key}${p === provider ? `  ${dim}${getModel(p)}${reset}` : ''}`);
  }
  console.log('');
}

// ============================================================================
// DISPATCH
// ============================================================================

async function dispatch(args: string[]): Promise<'server' | 'handled'> {
  const command = args[0];

  switch (command) {
    case 'serve':
    case 'server':
      await runServe(flagValue(args, '--port'));
      return 'server';

    case 'submit':
      await runSubmit(args[1], args.includes('--overwrite'));
      return 'handled';

    case 'show':
      await runShow(args[1]);
      return 'handled';

    case 'list':
      await runList(flagValue(args, '--subreddit'), args.includes('--all'));
      return 'handled';

    case 'delete':
      await runDelete(args[1]);
      return 'handled';

    case 'restore':
      await runRestore(args[1]);
      return 'handled';

    case 'stats':
      await runStats();
      return 'handled';

    case 'config':
      runConfig(args.slice(1));
      return 'handled';

    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      return 'handled';

    case '--version':
    case '-v':
      console.log(APP_VERSION);
      return 'handled';

    default:
      console.log(`${red}Unknown command:${reset} ${command}`);
      showHelp();
      process.exitCode = 1;
      return 'handled';
  }
}

/**
 * Run one CLI command. Resolves 'server' when the HTTP server keeps the
 * process alive, 'handled' when the command is done.
 */
export async function runCLI(args: string[]): Promise<'server' | 'handled'> {
  try {
    return await dispatch(args);
  } catch (error) {
    if (isReplicantError(error)) {
      console.error(`\n  ${red}Error:${reset} ${error.message}\n`);
    } else {
      logger.error('Command failed', error);
    }
    process.exitCode = 1;
    return 'handled';
  }
}
