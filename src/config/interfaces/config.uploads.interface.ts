export interface ConfigUploadsInterface {
  maxFileSize: number;
  maxFiles: number;
}
