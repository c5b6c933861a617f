const URN_PREFIX = "urn:dynastack";
const URN_SEP = "::";

export const createUrn = (
  stackName: string,
  projectName: string,
  resourceType: string,
  resourceName: string,
): string => [URN_PREFIX, stackName, projectName, resourceType, resourceName].join(URN_SEP);

export type ParsedUrn = {
  readonly stackName: string;
  readonly projectName: string;
  readonly resourceType: string;
  readonly resourceName: string;
};

export const parseUrn = (urn: string): ParsedUrn | undefined => {
  const parts = urn.split(URN_SEP);
  if (parts.length !== 5 || parts[0] !== URN_PREFIX) {
    return undefined;
  }
  const [, stackName, projectName, resourceType, resourceName] = parts;
  if (
    stackName === undefined ||
    projectName === undefined ||
    resourceType === undefined ||
    resourceName === undefined
  ) {
    return undefined;
  }
  return { stackName, projectName, resourceType, resourceName };
};

export const resourcePackage = (resourceType: string): string => {
  const sep = resourceType.indexOf(":");
  return sep === -1 ? resourceType : resourceType.slice(0, sep);
};
