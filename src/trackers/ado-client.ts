import { DefaultAzureCredential } from "@azure/identity";
import * as azdev from "azure-devops-node-api";
import type { IGitApi } from "azure-devops-node-api/GitApi.js";
import { BearerCredentialHandler } from "azure-devops-node-api/handlers/bearertoken.js";
import * as log from "../log.js";

const ADO_RESOURCE = "499b84ac-1321-427f-aa17-267ca6975798";

async function getAdoToken(): Promise<string> {
  // In Azure Pipelines the agent exposes SYSTEM_ACCESSTOKEN which can be used directly
  const systemToken = process.env.SYSTEM_ACCESSTOKEN;
  if (systemToken) {
    log.debug("Using SYSTEM_ACCESSTOKEN from Azure Pipelines environment");
    return systemToken;
  }

  try {
    log.debug("Requesting token for Azure DevOps resource via DefaultAzureCredential…");
    const credential = new DefaultAzureCredential();
    const response = await credential.getToken(`${ADO_RESOURCE}/.default`);
    return response.token;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(
      `Failed to obtain Azure DevOps token. ` +
        `Set SYSTEM_ACCESSTOKEN in Azure Pipelines, or configure environment ` +
        `credentials (AZURE_CLIENT_ID, AZURE_TENANT_ID, AZURE_CLIENT_SECRET), ` +
        `or log in with \`az login\`.\n${msg}`,
      { cause: err },
    );
  }
}

// One connection per organization, shared by every repository in it
const gitApiCache = new Map<string, Promise<IGitApi>>();

async function connect(orgUrl: string): Promise<IGitApi> {
  const token = await getAdoToken();
  log.debug(`Connecting to ${orgUrl}…`);
  const connection = new azdev.WebApi(orgUrl, new BearerCredentialHandler(token));
  return connection.getGitApi();
}

export function getGitApiForOrg(orgUrl: string): Promise<IGitApi> {
  let pending = gitApiCache.get(orgUrl);
  if (!pending) {
    pending = connect(orgUrl);
    // a failed connection should not poison later attempts
    void pending.catch(() => {
      gitApiCache.delete(orgUrl);
    });
    gitApiCache.set(orgUrl, pending);
  }
  return pending;
}
