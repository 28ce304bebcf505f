/**
 * Activity commands
 */

import type { Command } from 'commander';
import type { ActivitiesClient, ActivityRecord } from '@activity-signup/activities-client';
import { error, getOutputFormat, printData, printJson, success } from '../utils/output';

export type ClientFactory = (command: Command) => ActivitiesClient;

function spotsLeft(activity: ActivityRecord): number {
  return Math.max(0, activity.max_participants - activity.participants.length);
}

/**
 * Run an action, reporting failures and setting a non-zero exit code
 */
async function run(fallbackMessage: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    error(err instanceof Error ? err.message : fallbackMessage);
    process.exitCode = 1;
  }
}

export function registerActivityCommands(program: Command, getClient: ClientFactory): void {
  // list
  program
    .command('list')
    .description('List all activities')
    .action(async (_options: unknown, command: Command) => {
      await run('Failed to list activities', async () => {
        const activities = await getClient(command).listActivities();
        const rows = Object.entries(activities);

        printData(
          rows,
          {
            headers: ['ACTIVITY', 'SCHEDULE', 'ENROLLED', 'SPOTS LEFT'],
            getRow: ([name, activity]) => [
              name,
              activity.schedule,
              `${activity.participants.length}/${activity.max_participants}`,
              String(spotsLeft(activity)),
            ],
          },
          activities
        );
      });
    });

  // show
  program
    .command('show <activity>')
    .description('Show an activity and its participants')
    .action(async (activityName: string, _options: unknown, command: Command) => {
      await run('Failed to get activity', async () => {
        const activity = await getClient(command).getActivity(activityName);

        if (getOutputFormat() === 'json') {
          printJson(activity);
          return;
        }

        console.log(`${activityName}`);
        console.log(`  ${activity.description}`);
        console.log(`  Schedule: ${activity.schedule}`);
        console.log(`  Spots left: ${spotsLeft(activity)} of ${activity.max_participants}`);
        for (const participant of activity.participants) {
          console.log(`  - ${participant}`);
        }
      });
    });

  // signup
  program
    .command('signup <activity> <email>')
    .description('Sign up a student for an activity')
    .action(async (activityName: string, email: string, _options: unknown, command: Command) => {
      await run('Failed to sign up', async () => {
        const result = await getClient(command).signup(activityName, email);
        if (getOutputFormat() === 'json') {
          printJson(result);
        } else {
          success(result.message);
        }
      });
    });

  // remove
  program
    .command('remove <activity> <email>')
    .description('Remove a student from an activity')
    .action(async (activityName: string, email: string, _options: unknown, command: Command) => {
      await run('Failed to remove participant', async () => {
        const result = await getClient(command).removeParticipant(activityName, email);
        if (getOutputFormat() === 'json') {
          printJson(result);
        } else {
          success(result.message);
        }
      });
    });
}
