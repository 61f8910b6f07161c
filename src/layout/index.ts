export { AlignmentSetter, align, alignedPosition, type AlignmentType } from "./Alignment";
export { dryRunMeasurer, measureThenPlace, type WidgetMeasurer } from "./measure";
