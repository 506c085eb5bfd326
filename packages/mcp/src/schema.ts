import { JsonObjectSchema } from "@blender-bridge/transport";
import { z } from "zod";

const Vector3Schema = z.array(z.number()).length(3);
const Vector2Schema = z.array(z.number()).length(2);

const ObjectNameSchema = z.string().min(1).optional().describe("Name of the object (uses the active object if omitted).");
const MaterialNameSchema = z.string().min(1).optional().describe("Name of the material (uses the active material if omitted).");

export const EmptyInputSchema = z.object({});

export const GetObjectInfoInputSchema = z.object({
  object_name: z.string().min(1).describe("Name of the object to inspect."),
});

export const ExecuteBlenderCodeInputSchema = z.object({
  code: z.string().min(1).describe("Python code to run inside Blender. Prefer small steps."),
});

export const GetNodeTreeInputSchema = z.object({
  material_name: MaterialNameSchema,
  tree_type: z.enum(["shader", "geometry", "compositor"]).default("shader"),
});

export const GetModifierStackInputSchema = z.object({
  object_name: ObjectNameSchema,
});

export const SetViewportShadingInputSchema = z.object({
  shading_type: z.enum(["WIREFRAME", "SOLID", "MATERIAL", "RENDERED"]),
});

export const SwitchEditorInputSchema = z.object({
  editor_type: z.string().min(1).describe("VIEW_3D, NODE_EDITOR, PROPERTIES, OUTLINER, TIMELINE, ..."),
});

export const SetViewAngleInputSchema = z.object({
  view: z.enum(["TOP", "BOTTOM", "FRONT", "BACK", "LEFT", "RIGHT", "CAMERA"]),
});

export const CreateMaterialInputSchema = z.object({
  name: z.string().min(1),
  assign_to_active: z.boolean().default(true),
});

export const AddNodeInputSchema = z.object({
  node_type: z.string().min(1).describe("Node type identifier, e.g. ShaderNodeTexImage."),
  location: Vector2Schema.optional(),
  material_name: MaterialNameSchema,
});

export const RemoveNodeInputSchema = z.object({
  node_name: z.string().min(1),
  material_name: MaterialNameSchema,
});

export const SetNodeValueInputSchema = z.object({
  node_name: z.string().min(1),
  input_name: z.string().min(1).describe("Input socket name, e.g. Base Color or Roughness."),
  value: z.union([z.number(), z.boolean(), z.string(), z.array(z.number())]).describe("Number, or an array for colors and vectors."),
  material_name: MaterialNameSchema,
});

export const ConnectNodesInputSchema = z.object({
  from_node: z.string().min(1),
  from_socket: z.string().min(1),
  to_node: z.string().min(1),
  to_socket: z.string().min(1),
  material_name: MaterialNameSchema,
});

export const DisconnectNodeInputSchema = z.object({
  node_name: z.string().min(1),
  socket_name: z.string().min(1),
  socket_type: z.enum(["input", "output"]).default("input"),
  material_name: MaterialNameSchema,
});

export const AddModifierInputSchema = z.object({
  modifier_type: z.string().min(1).describe("SUBSURF, BEVEL, ARRAY, MIRROR, SOLIDIFY, BOOLEAN, ..."),
  name: z.string().min(1).optional(),
  object_name: ObjectNameSchema,
  settings: JsonObjectSchema.default({}),
});

export const ModifierRefInputSchema = z.object({
  modifier_name: z.string().min(1),
  object_name: ObjectNameSchema,
});

export const SetModifierSettingsInputSchema = z.object({
  modifier_name: z.string().min(1),
  settings: JsonObjectSchema,
  object_name: ObjectNameSchema,
});

export const SelectObjectInputSchema = z.object({
  object_name: z.string().min(1),
  extend: z.boolean().default(false),
  active: z.boolean().default(true),
});

export const SetModeInputSchema = z.object({
  mode: z.enum(["OBJECT", "EDIT", "SCULPT", "VERTEX_PAINT", "WEIGHT_PAINT", "TEXTURE_PAINT", "POSE"]),
  object_name: ObjectNameSchema,
});

export const AddPrimitiveInputSchema = z.object({
  primitive_type: z.enum(["CUBE", "SPHERE", "CYLINDER", "CONE", "TORUS", "PLANE", "CIRCLE", "MONKEY", "EMPTY"]),
  location: Vector3Schema.optional(),
  size: z.number().positive().optional(),
  name: z.string().min(1).optional(),
});

export const TransformObjectInputSchema = z.object({
  object_name: ObjectNameSchema,
  location: Vector3Schema.optional(),
  rotation: Vector3Schema.optional().describe("Rotation in degrees."),
  scale: Vector3Schema.optional(),
});

export const DeleteObjectInputSchema = z.object({
  object_name: ObjectNameSchema,
});

export const SetFrameInputSchema = z.object({
  frame: z.number().int(),
});

export const SetFrameRangeInputSchema = z.object({
  start: z.number().int(),
  end: z.number().int(),
});

export const KeyframeInputSchema = z.object({
  data_path: z.string().min(1).describe("Property path, e.g. location, rotation_euler, scale."),
  frame: z.number().int().optional(),
  object_name: ObjectNameSchema,
});

export const ExecuteActionSequenceInputSchema = z.object({
  actions: z
    .array(
      z.object({
        action: z.string().min(1),
        params: JsonObjectSchema.default({}),
      }),
    )
    .min(1),
});

export const SendCommandInputSchema = z.object({
  command_type: z.string().min(1).describe("Host command identifier."),
  params: JsonObjectSchema.default({}),
});

/**
 * `command` names the host command when it differs from the tool name;
 * `wireKeys` renames input fields on their way to the add-on.
 */
export const ToolDefinitions = [
  {
    name: "get_scene_info",
    description: "Get detailed information about the current Blender scene.",
    input: EmptyInputSchema,
  },
  {
    name: "get_object_info",
    description: "Get detailed information about a specific object in the scene.",
    input: GetObjectInfoInputSchema,
    wireKeys: { object_name: "name" },
  },
  {
    name: "execute_blender_code",
    description: "Execute arbitrary Python code in Blender.",
    command: "execute_code",
    input: ExecuteBlenderCodeInputSchema,
  },
  {
    name: "get_polyhaven_status",
    description: "Check whether the PolyHaven integration is enabled.",
    input: EmptyInputSchema,
  },
  {
    name: "get_hyper3d_status",
    description: "Check whether the Hyper3D Rodin integration is enabled.",
    input: EmptyInputSchema,
  },
  {
    name: "get_sketchfab_status",
    description: "Check whether the Sketchfab integration is enabled.",
    input: EmptyInputSchema,
  },
  {
    name: "get_hunyuan3d_status",
    description: "Check whether the Hunyuan3D integration is enabled.",
    input: EmptyInputSchema,
  },
  {
    name: "get_full_context",
    description: "Get the active editor, viewport, node editor, selection, scene settings, objects, materials and modifiers.",
    input: EmptyInputSchema,
  },
  {
    name: "get_node_tree",
    description: "Get the node tree of a material or geometry nodes setup.",
    input: GetNodeTreeInputSchema,
  },
  {
    name: "get_modifier_stack",
    description: "Get the modifier stack of an object with all settings.",
    input: GetModifierStackInputSchema,
  },
  {
    name: "get_viewport_state",
    description: "Get viewport shading, overlays, camera view and 3D cursor position.",
    input: EmptyInputSchema,
  },
  {
    name: "switch_editor",
    description: "Switch the active editor type.",
    input: SwitchEditorInputSchema,
  },
  {
    name: "set_viewport_shading",
    description: "Change the viewport shading mode.",
    input: SetViewportShadingInputSchema,
  },
  {
    name: "set_view_angle",
    description: "Set the viewport camera angle.",
    input: SetViewAngleInputSchema,
  },
  {
    name: "create_material",
    description: "Create a material with a Principled BSDF shader.",
    input: CreateMaterialInputSchema,
  },
  {
    name: "add_node",
    description: "Add a node to a material's shader node tree.",
    input: AddNodeInputSchema,
  },
  {
    name: "remove_node",
    description: "Remove a node from a material's node tree.",
    input: RemoveNodeInputSchema,
  },
  {
    name: "set_node_value",
    description: "Set the value of a node input.",
    input: SetNodeValueInputSchema,
  },
  {
    name: "connect_nodes",
    description: "Connect an output socket of one node to an input socket of another.",
    input: ConnectNodesInputSchema,
  },
  {
    name: "disconnect_node",
    description: "Remove all links from a node socket.",
    input: DisconnectNodeInputSchema,
  },
  {
    name: "add_modifier",
    description: "Add a modifier to an object.",
    input: AddModifierInputSchema,
  },
  {
    name: "remove_modifier",
    description: "Remove a modifier from an object.",
    input: ModifierRefInputSchema,
  },
  {
    name: "apply_modifier",
    description: "Apply a modifier to an object's mesh.",
    input: ModifierRefInputSchema,
  },
  {
    name: "set_modifier_settings",
    description: "Change the settings of an existing modifier.",
    input: SetModifierSettingsInputSchema,
  },
  {
    name: "select_object",
    description: "Select an object in the scene.",
    input: SelectObjectInputSchema,
  },
  {
    name: "set_mode",
    description: "Set the interaction mode.",
    input: SetModeInputSchema,
  },
  {
    name: "add_primitive",
    description: "Add a primitive mesh object.",
    input: AddPrimitiveInputSchema,
  },
  {
    name: "transform_object",
    description: "Set an object's location, rotation or scale.",
    input: TransformObjectInputSchema,
  },
  {
    name: "delete_object",
    description: "Delete an object.",
    input: DeleteObjectInputSchema,
  },
  {
    name: "set_frame",
    description: "Set the current animation frame.",
    input: SetFrameInputSchema,
  },
  {
    name: "set_frame_range",
    description: "Set the animation frame range.",
    input: SetFrameRangeInputSchema,
  },
  {
    name: "insert_keyframe",
    description: "Insert a keyframe on an object property.",
    input: KeyframeInputSchema,
  },
  {
    name: "delete_keyframe",
    description: "Delete a keyframe from an object property.",
    input: KeyframeInputSchema,
  },
  {
    name: "execute_action_sequence",
    description: "Execute several actions in one command. Each action is { action, params }.",
    input: ExecuteActionSequenceInputSchema,
  },
  {
    name: "send_command",
    description: "Send any host command by name with a raw parameter object.",
    input: SendCommandInputSchema,
  },
] as const;

export type BridgeToolName = (typeof ToolDefinitions)[number]["name"];
