/**
 * Seed loading
 *
 * 活动数据在进程启动时从 JSON 文件加载一次，之后只有报名名单会变化。
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { SeedError } from '../errors/registry-error';
import type { ActivityRecord, ActivitySeed } from '../types/activity';

/**
 * Bundled seed file path
 */
export const DEFAULT_SEED_PATH = fileURLToPath(
  new URL('../../data/seed-activities.json', import.meta.url)
);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseActivity(name: string, value: unknown): ActivityRecord {
  if (!isRecord(value)) {
    throw new SeedError(`Activity "${name}" must be an object`);
  }

  const { description, schedule, max_participants, participants } = value;

  if (typeof description !== 'string') {
    throw new SeedError(`Activity "${name}": description must be a string`);
  }
  if (typeof schedule !== 'string') {
    throw new SeedError(`Activity "${name}": schedule must be a string`);
  }
  if (
    typeof max_participants !== 'number' ||
    !Number.isInteger(max_participants) ||
    max_participants <= 0
  ) {
    throw new SeedError(`Activity "${name}": max_participants must be a positive integer`);
  }
  if (!Array.isArray(participants)) {
    throw new SeedError(`Activity "${name}": participants must be an array`);
  }

  const roster: string[] = [];
  for (const participant of participants) {
    if (typeof participant !== 'string' || participant.length === 0) {
      throw new SeedError(`Activity "${name}": participants must be non-empty strings`);
    }
    if (roster.includes(participant)) {
      throw new SeedError(`Activity "${name}": duplicate participant ${participant}`);
    }
    roster.push(participant);
  }

  if (roster.length > max_participants) {
    throw new SeedError(
      `Activity "${name}": ${roster.length} participants exceed max_participants ${max_participants}`
    );
  }

  return { description, schedule, max_participants, participants: roster };
}

/**
 * Validate raw seed data (e.g. parsed JSON)
 */
export function parseSeed(raw: unknown): ActivitySeed {
  if (!isRecord(raw)) {
    throw new SeedError('Seed must be an object keyed by activity name');
  }

  // fromEntries keeps names such as "__proto__" as own properties
  return Object.fromEntries(
    Object.entries(raw).map(([name, value]): [string, ActivityRecord] => {
      if (name.trim().length === 0) {
        throw new SeedError('Activity name must not be empty');
      }
      return [name, parseActivity(name, value)];
    })
  );
}

/**
 * Read and validate a seed JSON file
 */
export function loadSeedFile(filePath: string): ActivitySeed {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new SeedError(
      `Cannot read seed file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new SeedError(`Invalid JSON in seed file ${filePath}`);
  }

  return parseSeed(raw);
}

/**
 * Load the bundled seed (9 activities)
 */
export function loadDefaultSeed(): ActivitySeed {
  return loadSeedFile(DEFAULT_SEED_PATH);
}
