import { SignJWT, importPKCS8 } from "jose"
import { z } from "zod/v4"
import { log } from "@/lib/logger"

const GITHUB_API = "https://api.github.com"
const TOKEN_EXPIRY_BUFFER_MS = 5 * 60 * 1000

const installationTokenSchema = z.object({
  token: z.string(),
  expires_at: z.string(),
})

interface CachedToken {
  token: string
  expiresAt: number
}

export interface GitHubAppCredentials {
  appId: number
  installationId: number
  privateKey: string
}

const githubHeaders = (bearer: string) => ({
  Authorization: `Bearer ${bearer}`,
  Accept: "application/vnd.github+json",
  "X-GitHub-Api-Version": "2022-11-28",
})

/**
 * Issues GitHub App JWTs and installation access tokens. The installation
 * token is cached until shortly before it expires.
 */
export class GitHubAppAuth {
  private cached: CachedToken | null = null

  constructor(
    private readonly credentials: GitHubAppCredentials,
    private readonly fetchFn: typeof fetch = fetch,
  ) {}

  async appJWT(): Promise<string> {
    // PKCS#8 only: convert GitHub's PKCS#1 download with `openssl pkcs8 -topk8 -nocrypt`
    const privateKey = await importPKCS8(this.credentials.privateKey, "RS256")
    const now = Math.floor(Date.now() / 1000)

    return new SignJWT({})
      .setProtectedHeader({ alg: "RS256" })
      .setIssuedAt(now - 60)
      .setExpirationTime(now + 10 * 60)
      .setIssuer(String(this.credentials.appId))
      .sign(privateKey)
  }

  async installationToken(): Promise<string> {
    const cached = this.cached
    if (cached && cached.expiresAt > Date.now() + TOKEN_EXPIRY_BUFFER_MS) {
      return cached.token
    }

    const { installationId } = this.credentials
    const jwt = await this.appJWT()
    const response = await this.fetchFn(
      `${GITHUB_API}/app/installations/${installationId}/access_tokens`,
      { method: "POST", headers: githubHeaders(jwt) },
    )

    if (!response.ok) {
      const body = await response.text()
      log.error("Failed to get installation token", `HTTP ${response.status}: ${body}`, {
        installationId,
      })
      throw new Error(`failed to get installation token: HTTP ${response.status}`)
    }

    const data = installationTokenSchema.parse(await response.json())
    this.cached = { token: data.token, expiresAt: new Date(data.expires_at).getTime() }
    log.debug("Installation token refreshed", { installationId, expiresAt: data.expires_at })

    return data.token
  }
}
