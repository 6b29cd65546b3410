/**
 * Container Recipe
 * Typed model of the service image, rendered to and inspected from a Dockerfile
 */

import path from 'path';
import { z } from 'zod';
import { loadConfig, type Config } from '../config/index.js';

export interface CopyStep {
  sources: string[];
  destination: string;
}

export interface ImageRecipe {
  baseImage: string;
  workdir: string;
  copies: CopyStep[];
  /** RUN commands, in order, executed after the copies */
  install: string[];
  exposedPort: number;
  healthcheck: string[] | null;
  cmd: string[];
}

export interface Instruction {
  keyword: string;
  args: string;
  /** 1-based line the instruction starts on */
  line: number;
}

export interface DockerfileSummary {
  baseImage: string;
  workdir: string | null;
  exposedPorts: number[];
  cmd: string[] | null;
  healthcheck: string[] | null;
}

export class DockerfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DockerfileError';
  }
}

// ============================================
// Recipe
// ============================================

export function createImageRecipe(appConfig: Pick<Config, 'server'>): ImageRecipe {
  return {
    baseImage: 'node:20-slim',
    workdir: '/app',
    copies: [
      { sources: ['package.json', 'tsconfig.json', 'tsconfig.build.json'], destination: './' },
      { sources: ['backend/'], destination: './backend/' },
    ],
    install: ['npm install --no-audit --no-fund && npm run build && npm prune --omit=dev'],
    exposedPort: appConfig.server.port,
    healthcheck: ['node', 'dist/healthcheck.js'],
    cmd: ['node', 'dist/index.js'],
  };
}

function execForm(args: string[]): string {
  return `[${args.map(arg => JSON.stringify(arg)).join(', ')}]`;
}

export function renderDockerfile(recipe: ImageRecipe): string {
  const lines = [
    `FROM ${recipe.baseImage}`,
    `WORKDIR ${recipe.workdir}`,
    ...recipe.copies.map(copy => `COPY ${[...copy.sources, copy.destination].join(' ')}`),
    ...recipe.install.map(command => `RUN ${command}`),
    `EXPOSE ${recipe.exposedPort}`,
  ];

  if (recipe.healthcheck !== null) {
    lines.push(`HEALTHCHECK CMD ${execForm(recipe.healthcheck)}`);
  }
  lines.push(`CMD ${execForm(recipe.cmd)}`);

  return `${lines.join('\n')}\n`;
}

/** The recipe for the default configuration, independent of the process environment */
export function renderDefaultDockerfile(): string {
  return renderDockerfile(createImageRecipe(loadConfig({})));
}

// ============================================
// Inspection
// ============================================

export function parseDockerfile(text: string): Instruction[] {
  const instructions: Instruction[] = [];
  let pending: string[] = [];
  let startLine = 0;

  const lines = text.split(/\r?\n/);
  lines.forEach((raw, index) => {
    const trimmed = raw.trim();

    // Comments and blank lines are dropped, including inside a continuation
    if (trimmed === '' || trimmed.startsWith('#')) return;

    if (pending.length === 0) startLine = index + 1;

    if (trimmed.endsWith('\\')) {
      pending.push(trimmed.slice(0, -1).trim());
      return;
    }

    pending.push(trimmed);
    const joined = pending.filter(part => part !== '').join(' ');
    pending = [];

    const match = /^(\S+)\s*(.*)$/.exec(joined);
    if (match !== null) {
      const [, keyword = '', args = ''] = match;
      instructions.push({ keyword: keyword.toUpperCase(), args: args.trim(), line: startLine });
    }
  });

  if (pending.length > 0) {
    throw new DockerfileError(`Unterminated line continuation starting on line ${startLine}`);
  }

  return instructions;
}

const execFormSchema = z.array(z.string()).min(1);

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// Anything that is not a JSON array of strings runs in shell form
function parseCommand(args: string): string[] {
  if (args.startsWith('[')) {
    const parsed = execFormSchema.safeParse(parseJson(args));
    if (parsed.success) return parsed.data;
  }
  return ['/bin/sh', '-c', args];
}

function parseExposedPorts(instruction: Instruction): number[] {
  return instruction.args.split(/\s+/).filter(Boolean).map(token => {
    const match = /^(\d+)(?:\/(?:tcp|udp))?$/i.exec(token);
    const port = match === null ? NaN : Number(match[1]);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new DockerfileError(`Invalid EXPOSE port "${token}" on line ${instruction.line}`);
    }
    return port;
  });
}

function parseHealthcheck(instruction: Instruction): string[] | null {
  const rest = instruction.args.replace(/^(?:--\S+\s+)*/, '');
  if (/^NONE$/i.test(rest)) return null;

  const match = /^CMD\s+(.+)$/is.exec(rest);
  if (match === null || match[1] === undefined) {
    throw new DockerfileError(`Invalid HEALTHCHECK on line ${instruction.line}`);
  }
  return parseCommand(match[1].trim());
}

function parseFrom(args: string): { image: string; alias: string | null } {
  const [image = '', as, alias] = args.replace(/^(?:--\S+\s+)*/, '').split(/\s+/);
  if (as !== undefined && /^AS$/i.test(as) && alias !== undefined) {
    return { image, alias: alias.toLowerCase() };
  }
  return { image, alias: null };
}

/**
 * Summarise the final build stage: its base image, working directory,
 * exposed ports, health check and command. A stage built from an earlier
 * stage inherits that stage's settings and base image.
 */
export function inspectDockerfile(text: string): DockerfileSummary {
  const stages = new Map<string, DockerfileSummary>();
  let summary: DockerfileSummary | null = null;

  for (const instruction of parseDockerfile(text)) {
    if (instruction.keyword === 'FROM') {
      const { image, alias } = parseFrom(instruction.args);
      const parent = stages.get(image.toLowerCase());

      summary = parent !== undefined
        ? { ...parent, exposedPorts: [...parent.exposedPorts] }
        : { baseImage: image, workdir: null, exposedPorts: [], cmd: null, healthcheck: null };

      if (alias !== null) stages.set(alias, summary);
      continue;
    }

    if (summary === null) {
      if (instruction.keyword === 'ARG') continue;
      throw new DockerfileError(`${instruction.keyword} on line ${instruction.line} precedes FROM`);
    }

    switch (instruction.keyword) {
      case 'WORKDIR':
        summary.workdir = path.posix.resolve(summary.workdir ?? '/', instruction.args);
        break;
      case 'EXPOSE':
        summary.exposedPorts.push(...parseExposedPorts(instruction));
        break;
      case 'CMD':
        summary.cmd = parseCommand(instruction.args);
        break;
      case 'HEALTHCHECK':
        summary.healthcheck = parseHealthcheck(instruction);
        break;
    }
  }

  if (summary === null) {
    throw new DockerfileError('Dockerfile has no FROM instruction');
  }
  return summary;
}
