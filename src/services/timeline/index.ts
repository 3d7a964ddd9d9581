export {
  compose,
  selectLinesForLayout,
  motionOffsetsAt,
  type CompositorOptions,
  type MotionSettings,
} from './timeline-compositor'
export {
  DEFAULT_TALL_LAYOUT,
  DEFAULT_WIDE_LAYOUT,
  bubbleOpacity,
  buildTallDecoration,
  buildWideDecoration,
  measureBubble,
  wrapText,
  type CastMember,
} from './layouts'
