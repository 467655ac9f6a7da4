/** Body of the metadata token endpoint. */
export type TMetadataTokenResponse = {
  access_token: string
  expires_in: number
  token_type?: string
}

export type TCredential = {
  token: string
  expiresAtMs: number
}
