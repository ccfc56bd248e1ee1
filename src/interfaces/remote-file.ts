export interface RemoteFileOptions {
  /**
   * @description The path of the file on the remote host.
   */
  path: string;
  /**
   * @description Whether to read the file through sudo.
   */
  privileged?: boolean;
  /**
   * @description Whether the content must be kept out of displayed output.
   */
  sensitive?: boolean;
}

export interface ResourceState {
  /**
   * @description The address of the host and the inode of the file, joined by a dash.
   */
  id: string;
  /**
   * @description The file content, empty when the file is sensitive.
   */
  content: string;
  /**
   * @description The file content, empty unless the file is sensitive.
   */
  sensitiveContent: string;
}
