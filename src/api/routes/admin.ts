import { Router } from 'express';
import * as settingsService from '../../services/settings-service.js';
import * as userService from '../../services/user-service.js';
import * as groupService from '../../services/group-service.js';
import * as taskService from '../../services/task-service.js';
import { AccessStore } from '../../services/access-store.js';
import { NotFoundError } from '../../utils/error-handler.js';
import { asyncHandler, parseBody, requireAdmin } from '../middleware.js';
import { accessRoleSchema, groupSchema, settingsSchema, userSchema } from '../schemas.js';

export function createAdminRouter(access: AccessStore): Router {
  const router = Router();
  const adminOnly = requireAdmin(access, 'change settings');

  // -------------------------------------------------------
  //  Notification settings
  // -------------------------------------------------------

  router.get('/settings', asyncHandler(async (_req, res) => {
    res.json({ settings: await settingsService.getSettings() });
  }));

  router.put('/settings', adminOnly, asyncHandler(async (req, res) => {
    const patch = parseBody(settingsSchema, req.body);
    res.json({ settings: await settingsService.updateSettings(patch) });
  }));

  // -------------------------------------------------------
  //  Users
  // -------------------------------------------------------

  router.get('/users', asyncHandler(async (_req, res) => {
    res.json({ users: await userService.listUsers() });
  }));

  router.get('/users/:handle', asyncHandler(async (req, res) => {
    const user = await userService.getUser(req.params.handle);
    if (!user) throw new NotFoundError('User', req.params.handle);
    res.json({ user });
  }));

  router.put('/users/:handle', adminOnly, asyncHandler(async (req, res) => {
    const body = parseBody(userSchema, req.body);
    const user = await userService.upsertUser({ handle: req.params.handle, ...body });
    res.json({ user });
  }));

  router.delete('/users/:handle', adminOnly, asyncHandler(async (req, res) => {
    await userService.deleteUser(req.params.handle);
    res.json({ success: true });
  }));

  // -------------------------------------------------------
  //  Groups & membership
  // -------------------------------------------------------

  router.get('/groups', asyncHandler(async (_req, res) => {
    res.json({ groups: await groupService.listGroups() });
  }));

  router.get('/groups/:id', asyncHandler(async (req, res) => {
    const group = await groupService.getGroup(req.params.id);
    if (!group) throw new NotFoundError('Group', req.params.id);
    const members = await groupService.listGroupMembers(group.id);
    res.json({ group, members });
  }));

  router.put('/groups/:id', adminOnly, asyncHandler(async (req, res) => {
    const body = parseBody(groupSchema, req.body);
    res.json({ group: await groupService.upsertGroup({ id: req.params.id, name: body.name }) });
  }));

  router.delete('/groups/:id', adminOnly, asyncHandler(async (req, res) => {
    await groupService.deleteGroup(req.params.id);
    res.json({ success: true });
  }));

  router.put('/groups/:id/members/:handle', adminOnly, asyncHandler(async (req, res) => {
    await groupService.addMember(req.params.id, req.params.handle);
    res.json({ success: true });
  }));

  router.delete('/groups/:id/members/:handle', adminOnly, asyncHandler(async (req, res) => {
    await groupService.removeMember(req.params.id, req.params.handle);
    res.json({ success: true });
  }));

  // -------------------------------------------------------
  //  Allow-list
  // -------------------------------------------------------

  router.get('/access', adminOnly, (_req, res) => {
    res.json(access.list());
  });

  router.post('/access/:role/:handle', adminOnly, asyncHandler(async (req, res) => {
    const role = parseBody(accessRoleSchema, req.params.role);
    res.json(await access.add(role, req.params.handle));
  }));

  router.delete('/access/:role/:handle', adminOnly, asyncHandler(async (req, res) => {
    const role = parseBody(accessRoleSchema, req.params.role);
    res.json(await access.remove(role, req.params.handle));
  }));

  // -------------------------------------------------------
  //  Stats
  // -------------------------------------------------------

  router.get('/stats', asyncHandler(async (_req, res) => {
    res.json({ stats: await taskService.getStats() });
  }));

  router.get('/stats/by-user', adminOnly, asyncHandler(async (_req, res) => {
    res.json({ users: await taskService.getStatsByAssignee() });
  }));

  router.get('/stats/by-group', adminOnly, asyncHandler(async (_req, res) => {
    res.json({ groups: await taskService.getStatsByGroup() });
  }));

  return router;
}
