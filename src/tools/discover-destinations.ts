import { DiscoverRequestSchema, type DiscoverRequest } from "../services/discover.js";
import type { DestinationDiscovery } from "../services/discover.js";
import { formatDiscovery } from "../utils/formatting.js";

export const discoverSchema = DiscoverRequestSchema;

export async function handleDiscover(
  input: DiscoverRequest,
  discovery: DestinationDiscovery
): Promise<string> {
  const result = await discovery.discover(input);
  return formatDiscovery(result);
}
