import { Detection, IdentitySlot } from '../../types';

export type SlotAssignment =
  | { kind: 'promote' }
  | { kind: 'refresh'; slotId: string }
  // Detection belongs to an occupant promoted earlier in the same frame
  | { kind: 'ignore' };

/**
 * Maps this frame's detections onto active identity slots. The returned array
 * has one assignment per detection, in input order.
 */
export interface SlotMatcher {
  match(detections: Detection[], activeSlots: IdentitySlot[]): SlotAssignment[];
}

/**
 * Single-slot promotion policy.
 *
 * No per-detection identity matching is attempted: while any slot is active,
 * every detection refreshes the first one. A new occupant is promoted only
 * when the active set is empty, so a frame yields at most one promotion.
 */
export class SingleSlotMatcher implements SlotMatcher {
  match(detections: Detection[], activeSlots: IdentitySlot[]): SlotAssignment[] {
    const first = activeSlots.length > 0 ? activeSlots[0] : null;
    let promoted = false;

    return detections.map((): SlotAssignment => {
      if (first) {
        return { kind: 'refresh', slotId: first.id };
      }
      if (!promoted) {
        promoted = true;
        return { kind: 'promote' };
      }
      return { kind: 'ignore' };
    });
  }
}
