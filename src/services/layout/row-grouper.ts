/**
 * Row Grouper
 *
 * Clusters fragments into visual lines by vertical centre. Membership is
 * transitive: a fragment joins a row when it is within tolerance of the
 * row's nearest member, so a slowly drifting baseline stays one row.
 *
 * Fragments are swept in ascending centre order, which makes this
 * single-linkage clustering: only the lowest open row is ever in reach, and
 * a fragment within tolerance of two lines chains them into one row.
 *
 * @module services/layout/row-grouper
 */

import type { Fragment, Row } from '../../models/layout.js';
import type { LayoutConfig } from './config.js';
import { centerY } from './geometry.js';

interface Placed {
  fragment: Fragment;
  cy: number;
  order: number;
}

interface Cluster {
  members: Placed[];
  sumCy: number;
  /** Lowest member centre, the nearest one to the next fragment in the sweep */
  maxCy: number;
}

function centroid(cluster: Cluster): number {
  return cluster.sumCy / cluster.members.length;
}

/**
 * Group one page of fragments into rows.
 *
 * Rows are returned top-to-bottom, fragments within a row left-to-right.
 */
export function groupRows(fragments: Fragment[], config: Pick<LayoutConfig, 'rowTolerance'>): Row[] {
  if (fragments.length === 0) return [];

  const placed: Placed[] = fragments
    .map((fragment, order) => ({ fragment, cy: centerY(fragment.bbox), order }))
    .sort((a, b) => a.cy - b.cy || a.fragment.bbox.x1 - b.fragment.bbox.x1 || a.order - b.order);

  const clusters: Cluster[] = [];

  for (const item of placed) {
    const open = clusters[clusters.length - 1];
    if (open !== undefined && item.cy - open.maxCy <= config.rowTolerance) {
      open.members.push(item);
      open.sumCy += item.cy;
      open.maxCy = item.cy;
    } else {
      clusters.push({ members: [item], sumCy: item.cy, maxCy: item.cy });
    }
  }

  return clusters
    .map((cluster) => ({
      centerY: centroid(cluster),
      fragments: [...cluster.members]
        .sort(
          (a, b) =>
            a.fragment.bbox.x1 - b.fragment.bbox.x1 ||
            a.fragment.bbox.y1 - b.fragment.bbox.y1 ||
            a.order - b.order
        )
        .map((m) => m.fragment),
    }))
    .sort((a, b) => a.centerY - b.centerY)
    .map((row, index) => ({ index, ...row }));
}
