export type AppConfig = {
  nodeEnv: string;
  name: string;
  version: string;
  port: number;
  apiPrefix: string;
  swaggerEnabled: boolean;
};
