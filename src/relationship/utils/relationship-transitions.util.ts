import { RelationshipAttributes, RelationshipStatus } from '../model/relationship.model';

/** Allowed moves out of each status. Terminated has none. */
export const RELATIONSHIP_TRANSITIONS: Record<RelationshipStatus, readonly RelationshipStatus[]> = {
  [RelationshipStatus.PENDING]: [RelationshipStatus.ACTIVE],
  [RelationshipStatus.ACTIVE]: [RelationshipStatus.SUSPENDED, RelationshipStatus.TERMINATED],
  [RelationshipStatus.SUSPENDED]: [RelationshipStatus.ACTIVE, RelationshipStatus.TERMINATED],
  [RelationshipStatus.TERMINATED]: [],
};

/** Verb naming the move into each status, as used in client-facing errors. */
export const RELATIONSHIP_ACTIONS: Record<RelationshipStatus, string> = {
  [RelationshipStatus.PENDING]: 'invite',
  [RelationshipStatus.ACTIVE]: 'activate',
  [RelationshipStatus.SUSPENDED]: 'suspend',
  [RelationshipStatus.TERMINATED]: 'terminate',
};

export const canTransitionRelationship = (from: RelationshipStatus, to: RelationshipStatus): boolean =>
  RELATIONSHIP_TRANSITIONS[from].includes(to);

export const isRelationshipTerminal = (status: RelationshipStatus): boolean =>
  RELATIONSHIP_TRANSITIONS[status].length === 0;

export const canReceiveRequirements = (
  relationship: Pick<RelationshipAttributes, 'status' | 'supplierId'>,
): boolean => relationship.status === RelationshipStatus.ACTIVE && relationship.supplierId !== null;
