import type {
  UserInfo,
  SessionInfo,
  ProjectResponse,
  FolderResponse,
  FileMetadata,
  UploadResponse,
  TokenAuthResponse,
  TokenRefreshResponse,
} from '@filegate/shared';
import type { User } from '../types/user.js';
import type { RefreshToken, IssuedTokens } from '../types/token.js';
import type { Project, Folder, StoredFile, UsageStats } from '../types/project.js';
import { TOKEN_TYPE_BEARER, DOWNLOAD_URL_PREFIX } from '../config/constants.js';

/**
 * Internal records to snake_case response bodies. Family ids, record ids of
 * refresh tokens and hashes have no field here.
 */

export function toUserInfo(user: User): UserInfo {
  return {
    id: user.id,
    email: user.email,
    role: user.role,
    created_at: user.createdAt.toISOString(),
    must_change_password: user.mustChangePassword,
  };
}

export function toTokenRefreshResponse(tokens: IssuedTokens): TokenRefreshResponse {
  return {
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken,
    token_type: TOKEN_TYPE_BEARER,
    expires_in: tokens.expiresIn,
  };
}

export function toTokenAuthResponse(tokens: IssuedTokens, user: User): TokenAuthResponse {
  return { ...toTokenRefreshResponse(tokens), user: toUserInfo(user) };
}

export function toSessionInfo(token: RefreshToken): SessionInfo {
  return {
    issued_at: token.issuedAt.toISOString(),
    expires_at: token.expiresAt.toISOString(),
    user_agent: token.userAgent,
    ip_address: token.ipAddress,
  };
}

export function toProjectResponse(project: Project, stats?: UsageStats): ProjectResponse {
  return {
    id: project.id,
    name: project.name,
    api_key: project.apiKey,
    is_public: project.isPublic,
    created_at: project.createdAt.toISOString(),
    file_count: stats?.fileCount,
    total_size: stats?.totalSize,
  };
}

export function toFolderResponse(folder: Folder, stats?: UsageStats): FolderResponse {
  return {
    id: folder.id,
    project_id: folder.projectId,
    path: folder.path,
    is_public: folder.isPublic,
    created_at: folder.createdAt.toISOString(),
    file_count: stats?.fileCount,
    total_size: stats?.totalSize,
  };
}

export function downloadUrl(file: StoredFile): string {
  return `${DOWNLOAD_URL_PREFIX}${file.id}`;
}

export function toFileMetadata(file: StoredFile, folderPath: string | null): FileMetadata {
  return {
    id: file.id,
    project_id: file.projectId,
    folder_id: file.folderId,
    folder_path: folderPath,
    original_name: file.originalName,
    size: file.size,
    mime_type: file.mimeType,
    upload_date: file.uploadedAt.toISOString(),
    download_url: downloadUrl(file),
  };
}

export function toUploadResponse(file: StoredFile, folder: Folder | null): UploadResponse {
  return {
    file_id: file.id,
    original_name: file.originalName,
    size: file.size,
    mime_type: file.mimeType,
    download_url: downloadUrl(file),
    folder_path: folder?.path ?? null,
  };
}
