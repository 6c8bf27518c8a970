export type ChartOptions = {
  palette: string[],
  otherColor: string,
  otherLabel: string,
  // schools at or below this share go to the "other" slice
  minSlicePercentage: number,
  initialInterval: number,
  intervalGrowth: number,
  earliestYear: number,
  latestYear: number
};

export const chartDefaults: ChartOptions = {
  palette: [
    '#3498db',
    '#2ecc71',
    '#f1c40f',
    '#e74c3c',
    '#9b59b6',
    '#34495e',
    '#16a085',
    '#27ae60',
    '#2980b9',
    '#2c3e50',
    '#f39c12',
  ],
  otherColor: '#95a5a6',
  otherLabel: 'Other',
  minSlicePercentage: 2,
  initialInterval: 50,
  intervalGrowth: 1.5,
  earliestYear: 100,
  latestYear: 2024,
};

export const defaultInput = './sources/paintings.csv';
export const defaultOutputDir = './compiled';
