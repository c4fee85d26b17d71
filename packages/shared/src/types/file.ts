export interface FileMetadata {
  id: string;
  project_id: string;
  folder_id: string | null;
  folder_path: string | null;
  original_name: string;
  size: number;
  mime_type: string;
  upload_date: string;
  download_url: string;
}

export interface UploadResponse {
  file_id: string;
  original_name: string;
  size: number;
  mime_type: string;
  download_url: string;
  folder_path: string | null;
}

export interface DeleteFolderFilesRequest {
  folder_path: string;
}

export interface BulkDeleteRequest {
  file_ids: string[];
}

export interface DeleteCountResponse {
  message: string;
  deleted_count: number;
}
