export interface ConfigNeo4jInterface {
  uri: string;
  username: string;
  password: string;
  database: string;
}
