/**
 * What a reader must present to access a file
 */
export type AccessRequirement = 'open' | 'requires_api_key';

export interface VisibilityFlags {
  isPublic: boolean;
}

/**
 * Resolve the access requirement for a resource from its project and folder.
 * A public project opens every folder; a public folder opens itself even in a
 * private project. Evaluated on fresh rows for every request.
 */
export function resolveVisibility(
  project: VisibilityFlags,
  folder?: VisibilityFlags | null
): AccessRequirement {
  if (project.isPublic) {
    return 'open';
  }
  if (folder?.isPublic) {
    return 'open';
  }
  return 'requires_api_key';
}
