/**
 * Teaching-plan items returned by the model, pinned to the schedule frame.
 *
 * The frame's week and order always win over the model's values. An item is
 * matched by order first and by position second; a frame slot with no usable
 * item is a schema error.
 */

import { LooseScheduleItem, normalizeScheduleItem } from '../../scheduling/src/plan-params.js';
import { PlanItem, ScheduleSlot } from '../../scheduling/src/types.js';
import { isRecord } from '../../utils/result.js';
import { ShapeValidator } from './json-response.js';

const BRACKET_TAG = /\s*[[【][^\]】]*[\]】]\s*/g;

export function stripBracketTags(title: string): string {
  return title.replace(BRACKET_TAG, ' ').replace(/\s{2,}/g, ' ').trim();
}

function itemsOf(data: unknown): unknown[] | null {
  if (Array.isArray(data)) return data;
  if (isRecord(data) && Array.isArray(data.schedule)) return data.schedule;
  return null;
}

export function planItemsValidator(frame: ReadonlyArray<ScheduleSlot>, hourPerClass: number): ShapeValidator<PlanItem[]> {
  return data => {
    const raw = itemsOf(data);
    if (!raw) {
      return { ok: false, fields: ['(root)'] };
    }

    const candidates = raw.filter(isRecord).map(normalizeScheduleItem);
    const byOrder = new Map<number, LooseScheduleItem>();
    for (const candidate of candidates) {
      if (candidate.order !== null && !byOrder.has(candidate.order)) {
        byOrder.set(candidate.order, candidate);
      }
    }

    const items: PlanItem[] = [];
    const fields: string[] = [];
    frame.forEach((slot, index) => {
      const candidate = byOrder.get(slot.order) ?? candidates[index];
      const title = candidate ? stripBracketTags(candidate.title) : '';
      if (!candidate || !title) {
        fields.push(`[${index}].title`);
        return;
      }
      items.push({
        week: slot.week,
        order: slot.order,
        title,
        tasks: candidate.tasks,
        hour: candidate.hour !== null && candidate.hour > 0 ? candidate.hour : hourPerClass
      });
    });

    return fields.length > 0 ? { ok: false, fields } : { ok: true, value: items };
  };
}
