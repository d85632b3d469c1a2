//depthcore/config/chartConfig.ts

// Static content and layout of the depth profile chart.
// Page units are PDF points; 864 x 576 is a 12 x 8 inch sheet.

export interface AnnotationSpec {
  text: string;
  /** Domain coordinates; may sit outside the plotted domain. */
  x: number;
  z: number;
  /** Degrees, counter-clockwise. */
  rotation: number;
}

export interface LegendEntrySpec {
  label: string;
  value: number;
}

export interface ChartLayout {
  width: number;
  height: number;
  plot: { left: number; top: number; width: number; height: number };
  legendBar: { left: number; width: number };
}

export interface ChartConfig {
  title: string;
  xLabel: string;
  depthLabel: string;
  xTicks: number[];
  depthTicks: number[];
  annotations: AnnotationSpec[];
  legendTitle: string;
  legendEntries: LegendEntrySpec[];
  colorbarTicks: number[];
  caption: string;
  layout: ChartLayout;
}

export const DEFAULT_CHART_CONFIG: ChartConfig = {
  title: "Earth Depth Profile",
  xLabel: "Surface-X (m/f)",
  depthLabel: "Depth-Z (m/f)",
  xTicks: [1, 2, 3, 4, 5, 6],
  depthTicks: [0, 10, 20, 30, 40, 50, 60, 70, 80],

  annotations: [
    { text: "Soft Rock\nAnd Dry Sand", x: 2.0, z: -5, rotation: 0 },
    { text: "Wet Nature", x: 5.0, z: -5, rotation: 0 },
    { text: "More Hard", x: 0.7, z: 20, rotation: 90 },
    { text: "Most Hard\nStructure", x: 2.0, z: 85, rotation: 0 },
    { text: "Wet Condition", x: 3.5, z: 85, rotation: 0 },
    { text: "Water Bearing Rock", x: 5.0, z: 85, rotation: 0 },
  ],

  legendTitle: "Legend",
  legendEntries: [
    { label: "Hard Rock", value: 900 },
    { label: "Medium Hard Rock", value: 750 },
    { label: "Less Medium Rock, Below Soft Rock", value: 650 },
    { label: "Rock, Soil and Wet Nature", value: 350 },
    { label: "Less Dense Porous Rock", value: 190 },
    { label: "Little More Dense Porous Rock", value: 130 },
    { label: "More Dense Porous Rock (Water Bearing Rock Layer)", value: 85 },
  ],
  colorbarTicks: [55, 71, 93, 121, 157, 205, 267, 348, 453, 590, 768, 1000],

  caption:
    "The Earth Depth Profile describes the spread of Soft rock, Hard rock and the Water Bearing Porous rock information.",

  layout: {
    width: 864,
    height: 576,
    plot: { left: 72, top: 70, width: 470, height: 390 },
    legendBar: { left: 580, width: 24 },
  },
};
