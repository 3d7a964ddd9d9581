export { ScheduleRenderer, buildRenderPlan, type RenderAssets, type RenderPlan } from './schedule-renderer'
export { renderThumbnail, buildThumbnailArgs, formatThumbnailTitle, type ThumbnailOptions } from './thumbnail'
