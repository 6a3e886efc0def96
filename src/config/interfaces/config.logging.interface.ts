export interface ConfigLoggingInterface {
  level: string;
  consoleEnabled: boolean;
  labels: {
    application: string;
    environment: string;
  };
}
