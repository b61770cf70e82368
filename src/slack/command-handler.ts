import type { KnownBlock } from '@slack/types';
import * as taskService from '../services/task-service.js';
import * as settingsService from '../services/settings-service.js';
import * as workflow from '../services/task-workflow.js';
import type { AccessChecker } from '../services/access-store.js';
import { ADMIN_COMMANDS, Command, filterToQuery, paginate } from './commands.js';
import { buildTaskListBlocks } from './blocks/task-blocks.js';
import { buildHelpText, buildSettingsBlocks } from './blocks/menu-blocks.js';
import { buildAssigneeStatsBlocks, buildGroupStatsBlocks, buildGroupStatsText } from './blocks/stats-blocks.js';
import { AuthorizationError } from '../utils/error-handler.js';

export interface CommandContext {
  userId: string;
  access: AccessChecker;
  now?: Date;
}

export interface Reply {
  text: string;
  blocks?: KnownBlock[];
}

export async function executeCommand(command: Command, ctx: CommandContext): Promise<Reply> {
  const now = ctx.now ?? new Date();
  const isAdmin = ctx.access.isAdmin(ctx.userId);

  if (ADMIN_COMMANDS.has(command.kind) && !isAdmin) {
    throw new AuthorizationError(ctx.userId, `run "${command.kind}"`);
  }

  switch (command.kind) {
    case 'help':
      return { text: buildHelpText(isAdmin) };

    case 'my_tasks': {
      const tasks = await taskService.listTasks({ assignee: ctx.userId, status: command.status }, now);
      const header = command.status === 'open' ? 'Your open tasks' : 'Your completed tasks';
      return {
        text: `${header}: ${tasks.length}`,
        blocks: buildTaskListBlocks(`${header} (${tasks.length})`, tasks, { withActions: true, now }),
      };
    }

    case 'done': {
      const { changed } = await workflow.completeTask(command.taskId, ctx.userId, ctx.access, now);
      return {
        text: changed
          ? `:white_check_mark: Task #${command.taskId} marked as completed`
          : `Task #${command.taskId} was already completed`,
      };
    }

    case 'new': {
      const { taskGroup, tasks } = await workflow.createTaskGroup(
        { taskText: command.text, deadline: command.deadline, groupId: command.groupId, assignees: command.assignees },
        ctx.userId,
        now
      );
      const assignees = tasks.map((t) => `<@${t.assigned_to}>`).join(', ');
      return { text: `Task created! Group #${taskGroup.id} for ${assignees}, due ${taskGroup.deadline}` };
    }

    case 'all': {
      const tasks = await taskService.listTasks(filterToQuery(command.filter), now);
      const page = paginate(tasks, command.page);
      const nav = [page.hasPrev ? `\`all ${command.filter} ${page.page - 1}\`` : '', page.hasNext ? `\`all ${command.filter} ${page.page + 1}\`` : '']
        .filter(Boolean)
        .join(' | ');
      return {
        text: `${tasks.length} task(s), page ${page.page}/${page.pages}`,
        blocks: buildTaskListBlocks(`Tasks: ${command.filter} (${tasks.length})`, page.items, {
          withActions: true,
          footer: `Page ${page.page}/${page.pages}${nav ? ` | ${nav}` : ''}`,
          now,
        }),
      };
    }

    case 'overdue': {
      const tasks = await taskService.getOverdueTasks(now);
      return {
        text: tasks.length === 0 ? 'No overdue tasks :tada:' : `${tasks.length} overdue task(s)`,
        blocks: buildTaskListBlocks(`:rotating_light: Overdue (${tasks.length})`, tasks, { withActions: true, now }),
      };
    }

    case 'by_user': {
      const people = await taskService.getStatsByAssignee(now);
      return { text: `Tasks by person: ${people.length}`, blocks: buildAssigneeStatsBlocks(people) };
    }

    case 'by_group': {
      const groups = await taskService.getStatsByGroup(now);
      return { text: buildGroupStatsText(groups), blocks: buildGroupStatsBlocks(groups) };
    }

    case 'delete': {
      const { tasks } = await workflow.deleteTaskGroup(command.groupTaskId, ctx.userId, now);
      return { text: `:wastebasket: Task group #${command.groupTaskId} deleted (${tasks.length} task(s))` };
    }

    case 'settings': {
      const [settings, stats] = await Promise.all([settingsService.getSettings(), taskService.getStats(now)]);
      return { text: 'Notification settings', blocks: buildSettingsBlocks(settings, stats) };
    }

    case 'notify':
      await settingsService.setSetting(command.event, command.enabled);
      return { text: `Notifications for \`${command.event}\` are now ${command.enabled ? 'on' : 'off'}` };

    case 'unknown':
      return { text: 'Sorry, I didn\'t understand that. Type `help` to see what I can do.' };
  }
}
