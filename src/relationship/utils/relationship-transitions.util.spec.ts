import { RelationshipStatus } from '../model/relationship.model';
import {
  canReceiveRequirements,
  canTransitionRelationship,
  isRelationshipTerminal,
} from './relationship-transitions.util';

const ALL = Object.values(RelationshipStatus);

describe('relationship transitions', () => {
  it.each([
    [RelationshipStatus.PENDING, RelationshipStatus.ACTIVE],
    [RelationshipStatus.ACTIVE, RelationshipStatus.SUSPENDED],
    [RelationshipStatus.ACTIVE, RelationshipStatus.TERMINATED],
    [RelationshipStatus.SUSPENDED, RelationshipStatus.ACTIVE],
    [RelationshipStatus.SUSPENDED, RelationshipStatus.TERMINATED],
  ])('allows %s -> %s', (from, to) => {
    expect(canTransitionRelationship(from, to)).toBe(true);
  });

  it('allows exactly five moves in total', () => {
    const allowed = ALL.flatMap((from) => ALL.filter((to) => canTransitionRelationship(from, to)));
    expect(allowed).toHaveLength(5);
  });

  it('treats terminated as the only terminal status', () => {
    expect(ALL.filter(isRelationshipTerminal)).toEqual([RelationshipStatus.TERMINATED]);
  });

  it('does not allow pending to be suspended or terminated', () => {
    expect(canTransitionRelationship(RelationshipStatus.PENDING, RelationshipStatus.SUSPENDED)).toBe(false);
    expect(canTransitionRelationship(RelationshipStatus.PENDING, RelationshipStatus.TERMINATED)).toBe(false);
  });

  describe('canReceiveRequirements', () => {
    it('needs an active relationship with a linked supplier', () => {
      expect(canReceiveRequirements({ status: RelationshipStatus.ACTIVE, supplierId: 'sup-1' })).toBe(true);
      expect(canReceiveRequirements({ status: RelationshipStatus.ACTIVE, supplierId: null })).toBe(false);
      expect(canReceiveRequirements({ status: RelationshipStatus.SUSPENDED, supplierId: 'sup-1' })).toBe(false);
      expect(canReceiveRequirements({ status: RelationshipStatus.PENDING, supplierId: null })).toBe(false);
    });
  });
});
