export interface DownloadResult {
  issues: number;
  attachments: number;
  skippedAttachments: number;
}

export interface LabelEditResult {
  processed: number;
  updated: number;
}
