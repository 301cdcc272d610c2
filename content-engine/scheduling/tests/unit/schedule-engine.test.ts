import { describe, test, expect } from '@jest/globals';
import {
  availableSlotCount,
  buildScheduleFrame,
  checkScheduleCapacity,
  planSchedule,
  toInteger
} from '../../src/schedule-engine.js';
import { CalendarParams, ScheduleRequest } from '../../src/types.js';

const semester: CalendarParams = {
  totalWeeks: 18,
  classesPerWeek: 2,
  firstWeekClasses: 1
};

describe('schedule engine', () => {
  describe('availableSlotCount', () => {
    test('uses first-week capacity for week 1 only', () => {
      expect(availableSlotCount(semester)).toBe(35);
    });

    test('subtracts skipped slots inside capacity', () => {
      const count = availableSlotCount({
        ...semester,
        skipSlots: [
          { week: 3, class: 2 },
          { week: 5, class_index: 1 },
          { week: '7', session: '1' }
        ]
      });
      expect(count).toBe(32);
    });

    test('ignores skipped slots outside the calendar or the week capacity', () => {
      const count = availableSlotCount({
        ...semester,
        skipSlots: [
          { week: 1, class: 2 },    // week 1 only has one class
          { week: 19, class: 1 },   // past the last week
          { week: 4, class: 3 },    // beyond classes per week
          { week: 'x', class: 1 },
          { week: 2 }
        ]
      });
      expect(count).toBe(35);
    });

    test('clamps classes per week to 7 and first-week classes to the weekly count', () => {
      expect(availableSlotCount({ totalWeeks: 2, classesPerWeek: 9, firstWeekClasses: 12 })).toBe(14);
      expect(availableSlotCount({ totalWeeks: 3, classesPerWeek: 2, firstWeekClasses: 0 })).toBe(5);
    });

    test('returns zero for an empty calendar', () => {
      expect(availableSlotCount({ totalWeeks: 0, classesPerWeek: 2, firstWeekClasses: 1 })).toBe(0);
      expect(availableSlotCount({ totalWeeks: 4, classesPerWeek: 0, firstWeekClasses: 1 })).toBe(0);
    });
  });

  describe('buildScheduleFrame', () => {
    test('fills week by week and stops once every class is placed', () => {
      const frame = buildScheduleFrame(semester, 18);

      expect(frame).toHaveLength(18);
      expect(frame[0]).toEqual({ order: 1, week: 1 });
      expect(frame[1]).toEqual({ order: 2, week: 2 });
      expect(frame[2]).toEqual({ order: 3, week: 2 });
      expect(frame[17]).toEqual({ order: 18, week: 10 });
    });

    test('produces contiguous orders and never uses a skipped slot', () => {
      const params: CalendarParams = {
        totalWeeks: 4,
        classesPerWeek: 2,
        firstWeekClasses: 2,
        skipSlots: [{ week: 1, class: 2 }, { week: 3, class: 1 }]
      };
      const frame = buildScheduleFrame(params, 6);

      expect(frame.map(slot => slot.order)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(frame.map(slot => slot.week)).toEqual([1, 2, 2, 3, 4, 4]);
    });

    test('returns fewer slots when the calendar runs out', () => {
      expect(buildScheduleFrame({ totalWeeks: 2, classesPerWeek: 1, firstWeekClasses: 1 }, 5)).toHaveLength(2);
    });

    test('returns no slots for an empty calendar', () => {
      expect(buildScheduleFrame({ totalWeeks: 0, classesPerWeek: 1, firstWeekClasses: 1 }, 3)).toEqual([]);
    });
  });

  describe('checkScheduleCapacity', () => {
    test('accepts a surplus within the slack', () => {
      expect(checkScheduleCapacity(20, 18).isSuccess()).toBe(true);
      expect(checkScheduleCapacity(24, 18).isSuccess()).toBe(true);
      expect(checkScheduleCapacity(18, 18).isSuccess()).toBe(true);
    });

    test('rejects a shortage', () => {
      const result = checkScheduleCapacity(17, 18);
      expect(result.isError()).toBe(true);
      expect(result.errors?.[0].code).toBe('E-SCHEDULE-CAPACITY');
      expect(result.errors?.[0].message).toContain('needs 18 classes but only 17 slots');
    });

    test('rejects a surplus larger than the slack', () => {
      const result = checkScheduleCapacity(25, 18);
      expect(result.errors?.[0].code).toBe('E-SCHEDULE-SLACK');
    });

    test('honours a custom slack', () => {
      expect(checkScheduleCapacity(25, 18, 7).isSuccess()).toBe(true);
      expect(checkScheduleCapacity(19, 18, 0).isError()).toBe(true);
    });
  });

  describe('planSchedule', () => {
    const request: ScheduleRequest = {
      ...semester,
      totalHours: 72,
      theoryHours: 40,
      hourPerClass: 4,
      finalReview: true
    };

    test('derives class counts and the frame for a standard semester', () => {
      const result = planSchedule({ ...request, totalWeeks: 10 });

      expect(result.isSuccess()).toBe(true);
      const plan = result.value;
      expect(plan?.actualClasses).toBe(18);
      expect(plan?.availableSlots).toBe(19);
      expect(plan?.theoryClasses).toBe(10);
      expect(plan?.practiceClasses).toBe(8);
      expect(plan?.frame).toHaveLength(18);
      expect(plan?.contentFrame).toHaveLength(17);
      expect(plan?.frame[17]).toEqual({ order: 18, week: 10 });
    });

    test('keeps every slot for content when there is no final review', () => {
      const result = planSchedule({ ...request, totalWeeks: 10, finalReview: false });
      expect(result.value?.contentFrame).toHaveLength(18);
    });

    test('rejects the 18-week calendar because its slack exceeds the limit', () => {
      const result = planSchedule(request);
      expect(result.errors?.[0].code).toBe('E-SCHEDULE-SLACK');
    });

    test('accepts the 18-week calendar under a wider slack', () => {
      const result = planSchedule(request, 17);
      expect(result.value?.availableSlots).toBe(35);
      expect(result.value?.frame.slice(0, 2)).toEqual([{ order: 1, week: 1 }, { order: 2, week: 2 }]);
    });

    test('rejects a non-positive hour per class', () => {
      expect(planSchedule({ ...request, hourPerClass: 0 }).errors?.[0].code).toBe('E-SCHEDULE-HOUR-PER-CLASS');
    });

    test('rejects hours that do not cover one class', () => {
      expect(planSchedule({ ...request, totalHours: 3 }).errors?.[0].code).toBe('E-SCHEDULE-NO-CLASSES');
    });
  });

  describe('toInteger', () => {
    test('accepts numbers and integer strings only', () => {
      expect(toInteger(3)).toBe(3);
      expect(toInteger(3.9)).toBe(3);
      expect(toInteger(' 12 ')).toBe(12);
      expect(toInteger('1.5')).toBeNull();
      expect(toInteger(true)).toBeNull();
      expect(toInteger(null)).toBeNull();
    });
  });
});
