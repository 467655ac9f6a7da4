import { MetadataError } from '../../core/errors.ts'
import type { MetadataApi } from './metadata.api.ts'

export type TFolderFeatureOptions = {
  api: Pick<MetadataApi, 'fetch'>
  folderUrl: string
}

/**
 * Resolves the cloud folder the instance belongs to.
 * The first successful lookup is kept for the lifetime of the feature.
 */
export class FolderFeature {
  private readonly api: Pick<MetadataApi, 'fetch'>
  private readonly folderUrl: string
  private folderId: string | null = null

  constructor(options: TFolderFeatureOptions) {
    this.api = options.api
    this.folderUrl = options.folderUrl
  }

  public async resolveFolderId(): Promise<string> {
    if (this.folderId !== null) return this.folderId

    const body = await this.api.fetch(this.folderUrl)
    const folderId = body.toString('utf8')
    // An empty body is never a folder id, even when the request itself succeeded.
    if (folderId === '') {
      throw new MetadataError(
        `unable to fetch folder id from URL ${this.folderUrl}: empty response`,
        { kind: 'malformed', url: this.folderUrl },
      )
    }

    this.folderId = folderId
    return folderId
  }

  /** The cached folder id, or null before the first successful lookup. */
  get cachedFolderId(): string | null {
    return this.folderId
  }
}
