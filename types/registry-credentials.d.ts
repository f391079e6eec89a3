/** Basic credentials for one registry host. */
export interface RegistryCredentials {
  password: string

  username: string
}
