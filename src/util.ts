export const calculateMean = <T extends number>(arr: T[]): number => {
  if (arr.length === 0) return 0;
  const sum = arr.reduce((acc, curr) => acc + curr, 0);
  return sum / arr.length;
};

export const calculateMax = <T extends number>(arr: T[]): number => {
  if (arr.length === 0) return 0;
  return arr.reduce((acc, curr) => (curr > acc ? curr : acc), arr[0]);
};
