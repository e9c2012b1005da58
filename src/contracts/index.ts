export type {
  Size,
  OutWidth,
  Anchor,
  GeometryPlan,
  Rgb,
  Color,
  Dynamic,
  Param,
  FrameParams,
  TextStyle,
  CanvasRef,
  FrameTask,
} from "./types";
