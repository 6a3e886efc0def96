export interface ConfigApiInterface {
  url: string;
  host: string;
  port: number;
  env: string;
}
