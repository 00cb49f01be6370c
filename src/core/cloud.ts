export type CloudKind = 'aws' | 'gcp' | 'azure';

export const CLOUDS: readonly CloudKind[] = ['aws', 'gcp', 'azure'];

export function isCloudKind(value: string): value is CloudKind {
  return CLOUDS.some((cloud) => cloud === value);
}
