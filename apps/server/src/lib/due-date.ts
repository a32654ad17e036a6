const workingDaysPerWeek = 5;
const spareCalendarDays = 7;

export const isWorkingDay = (date: Date): boolean => {
  const day = date.getUTCDay();
  return day !== 0 && day !== 6;
};

/**
 * Due date for a loan starting at `borrowedAt`: `maxWeeks` working weeks later, counted in
 * Monday-Friday days (UTC) and returned as the last millisecond of that day.
 */
export const computeDueDate = (borrowedAt: Date, maxWeeks = 4): Date => {
  const current = new Date(borrowedAt.getTime());
  const targetWorkingDays = maxWeeks * workingDaysPerWeek;
  const calendarLimit = maxWeeks * 7 + spareCalendarDays;
  let workingDays = 0;

  for (let step = 0; step < calendarLimit; step += 1) {
    current.setUTCDate(current.getUTCDate() + 1);
    if (isWorkingDay(current)) {
      workingDays += 1;
    }
    if (workingDays >= targetWorkingDays) {
      break;
    }
  }

  current.setUTCHours(23, 59, 59, 999);
  return current;
};
