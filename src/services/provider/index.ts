export { ProviderController } from './provider.controller';
export { createProviderRoutes } from './provider.routes';
