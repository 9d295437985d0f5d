import type {
  BoundingBox,
  LayoutElement,
  LayoutGroup,
} from '@regroup/model';

import { CORRECTION } from '../config/constants';
import {
  center,
  envelopeOf,
  euclideanDistance,
  iou,
} from '../geometry/bounding-box';
import { groupMembers } from '../groups/group-factory';

/**
 * Envelope of a group as if `elementId` were not part of it
 */
export function envelopeWithout(
  group: LayoutGroup,
  elementId: string,
): BoundingBox {
  return (
    envelopeOf(
      groupMembers(group)
        .filter((member) => member.id !== elementId)
        .map((member) => member.bbox),
    ) ?? group.anchor.element.bbox
  );
}

/**
 * Decide which of two groups a contested child belongs to
 *
 * A clear IoU difference (at least 0.15) wins; otherwise the closer envelope
 * center does, and a tie keeps the current owner.
 *
 * @returns Id of `owner` or `other`
 */
export function chooseOwner(
  element: LayoutElement,
  owner: LayoutGroup,
  other: LayoutGroup,
): string {
  const ownerEnvelope = envelopeWithout(owner, element.id);
  const ownerIou = iou(element.bbox, ownerEnvelope);
  const otherIou = iou(element.bbox, other.envelope);

  if (Math.abs(ownerIou - otherIou) >= CORRECTION.REASSIGN_IOU_DELTA) {
    return otherIou > ownerIou ? other.id : owner.id;
  }

  const elementCenter = center(element.bbox);
  const ownerDistance = euclideanDistance(elementCenter, center(ownerEnvelope));
  const otherDistance = euclideanDistance(
    elementCenter,
    center(other.envelope),
  );
  return otherDistance < ownerDistance ? other.id : owner.id;
}
