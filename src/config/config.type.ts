import { AppConfig } from './app-config.type';

export type AllConfigType = {
  app: AppConfig;
};
