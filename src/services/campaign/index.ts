export { CampaignController } from './campaign.controller';
export { createCampaignRoutes } from './campaign.routes';
