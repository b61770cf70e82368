import { Router } from 'express';
import * as taskService from '../../services/task-service.js';
import * as workflow from '../../services/task-workflow.js';
import type { AccessChecker } from '../../services/access-store.js';
import { NotFoundError } from '../../utils/error-handler.js';
import { asyncHandler, parseBody, parseId, requireActor, requireAdmin } from '../middleware.js';
import {
  addAssigneesSchema,
  createTaskGroupSchema,
  listTasksQuerySchema,
  updateTaskGroupSchema,
} from '../schemas.js';

export function createTasksRouter(access: AccessChecker): Router {
  const router = Router();

  // -------------------------------------------------------
  //  Tasks
  // -------------------------------------------------------

  router.get('/tasks', asyncHandler(async (req, res) => {
    const filter = parseBody(listTasksQuerySchema, req.query);
    const tasks = await taskService.listTasks(filter);
    res.json({ tasks });
  }));

  router.get('/tasks/:id', asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'task');
    const task = await taskService.getTaskById(id);
    if (!task) throw new NotFoundError('Task', id);
    res.json({ task });
  }));

  router.post('/tasks/:id/complete', asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'task');
    const { task, changed } = await workflow.completeTask(id, requireActor(req), access);
    res.json({ success: true, changed, task });
  }));

  router.delete('/tasks/:id', requireAdmin(access, 'delete tasks'), asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'task');
    const { remaining } = await workflow.deleteTask(id, requireActor(req));
    res.json({ success: true, remaining_in_group: remaining });
  }));

  // -------------------------------------------------------
  //  Task groups
  // -------------------------------------------------------

  router.post('/task-groups', requireAdmin(access, 'create tasks'), asyncHandler(async (req, res) => {
    const body = parseBody(createTaskGroupSchema, req.body);
    const { taskGroup, tasks } = await workflow.createTaskGroup(
      {
        taskText: body.task_text,
        deadline: body.deadline,
        groupId: body.group_id,
        assignees: body.assigned_to,
      },
      requireActor(req)
    );
    res.status(201).json({ success: true, task_group: taskGroup, tasks });
  }));

  router.get('/task-groups/:id', asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'task group');
    const taskGroup = await taskService.getTaskGroupById(id);
    if (!taskGroup) throw new NotFoundError('Task group', id);
    const tasks = await taskService.getTasksByGroupTask(id);
    res.json({ task_group: taskGroup, tasks });
  }));

  router.patch('/task-groups/:id', requireAdmin(access, 'edit tasks'), asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'task group');
    const body = parseBody(updateTaskGroupSchema, req.body);
    const taskGroup = await workflow.updateTaskGroup(
      id,
      { taskText: body.task_text, deadline: body.deadline, groupId: body.group_id },
      requireActor(req)
    );
    res.json({ success: true, task_group: taskGroup });
  }));

  router.post('/task-groups/:id/assignees', requireAdmin(access, 'assign tasks'), asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'task group');
    const body = parseBody(addAssigneesSchema, req.body);
    const tasks = await workflow.addAssignees(id, body.assigned_to, requireActor(req));
    res.status(201).json({ success: true, tasks });
  }));

  router.delete('/task-groups/:id', requireAdmin(access, 'delete tasks'), asyncHandler(async (req, res) => {
    const id = parseId(req.params.id, 'task group');
    const { tasks } = await workflow.deleteTaskGroup(id, requireActor(req));
    res.json({ success: true, deleted_tasks: tasks.length });
  }));

  return router;
}
