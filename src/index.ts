export { parseColor, formatColor, mixColor, colorsClose, rgba, type Color } from './colorUtils.js';
export {
    createGradient,
    colorAt,
    sliceGradient,
    computeCenteredSlice,
    sliceToGradient,
    reverseGradient,
    type Fill,
    type GradientDefinition,
    type GradientSlice,
    type GradientStop,
    type StopInput,
} from './gradient/gradient.js';
export {
    buttonGradientStops,
    lockGradientStops,
    limitGradientStops,
    fullHeightGradientStops,
    paletteGradient,
    slicePalette,
    type PaletteName,
} from './gradient/palettes.js';
export { PREMIUM_THEME, resolveTheme, type PremiumTheme } from './theme.js';
export { BOX_STYLE, type BoxStyle } from './boxStyle.js';
export { EventStream, EventEmitter, Lifetime, once, type EventSource, type Listener, type Unsubscribe } from './events.js';

export { linear, easeOutCirc, easeOutQuad, type Easing } from './animation/easing.js';
export {
    createAnimationFrameScheduler,
    createTimerScheduler,
    defaultFrameScheduler,
    type FrameScheduler,
} from './animation/frameScheduler.js';
export { AnimationLoop } from './animation/animationLoop.js';
export { SimpleAnimation } from './animation/simpleAnimation.js';
export { ManualFrameScheduler } from './testability/manualScheduler.js';

export { Bubble, type BubbleShape } from './bubble/bubble.js';
export { PREMIUM_BUBBLE_STYLE, LOCK_ICON, resolveBubbleStyle, type BubbleIcon, type BubbleStyle } from './bubble/bubbleStyle.js';
export {
    STEP_BEFORE_DEFLECTION,
    STEP_AFTER_DEFLECTION,
    DEFLECTION,
    DEFLECTION_SMALL,
    computeBubbleLeft,
    computeEdgeBoundary,
    computeEdgeFactor,
    computeFrame,
    computeRotation,
    createTimeline,
    selectDeflection,
    timelineDuration,
    type BubbleTrack,
    type TimelineFrame,
    type TimelineState,
} from './bubble/bubbleTimeline.js';
export { computeTailGeometry, type TailGeometry } from './bubble/tailGeometry.js';
export { BubbleWidget, type BubbleHost, type BubblePaint, type BubbleWidgetOptions } from './bubble/bubbleWidget.js';
export { BubbleRow, addBubbleRow, type BubbleRowOptions } from './bubble/bubbleRow.js';
export {
    plainTextFactory,
    phraseTextFactory,
    processTextFactory,
    withCustomText,
    type PluralPhrase,
    type TextFactory,
} from './bubble/textFactory.js';

export { LimitLine, LIMIT_LINE_STYLE, limitLineFromNumbers, type LimitLineLayout } from './limits/limitLine.js';
export { colorListRows, MIN_COLORED_ROWS, type RowSpan } from './limits/listColoring.js';
export { showList, LIST_BOX_STYLE, type ListEntry, type ListBoxLayout } from './limits/listBox.js';
export { AccountsRow, ACCOUNTS_ROW_STYLE, type AccountColumn } from './limits/accountsRow.js';

export { paintBubble } from './render/bubblePainter.js';
export { paintLimitLine, paintListBox, paintAccountColumn } from './render/limitPainter.js';
