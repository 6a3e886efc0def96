export interface ConfigOpenApiInterface {
  enabled: boolean;
  path: string;
  title: string;
  description: string;
  version: string;
}
