export interface ProjectResponse {
  id: string;
  name: string;
  api_key: string;
  is_public: boolean;
  created_at: string;
  file_count?: number;
  total_size?: number;
}

export interface CreateProjectRequest {
  name: string;
  is_public?: boolean;
}

export interface UpdateProjectRequest {
  name?: string;
  is_public?: boolean;
}

export interface FolderResponse {
  id: string;
  project_id: string;
  path: string;
  is_public: boolean;
  created_at: string;
  file_count?: number;
  total_size?: number;
}

export interface CreateFolderRequest {
  project_id: string;
  path: string;
  is_public?: boolean;
}

export interface UpdateFolderVisibilityRequest {
  is_public: boolean;
}
