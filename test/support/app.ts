import { createApp } from '../../src/app';
import { CopilotService } from '../../src/copilot-service';
import { InMemoryCopilotRepository } from './fakes';
import { createSyncedMirror, createUserServices } from './services';

export const buildTestApp = async (adminToken: string | null = 'test-admin-token') => {
  const userServices = createUserServices();
  const mirror = await createSyncedMirror();
  const copilots = new InMemoryCopilotRepository();
  const copilotService = new CopilotService(copilots, mirror, () => userServices.clock.now);
  const { app, apollo } = await createApp({
    userService: userServices.userService,
    copilotService,
    mirror,
    adminToken
  });
  return { ...userServices, app, apollo, mirror, copilots, copilotService };
};
