import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export const ASSET_CREATION_STRATEGY_PROMPT = "asset_creation_strategy";

export const ASSET_CREATION_STRATEGY = [
  "When creating 3D content in Blender:",
  "",
  "0. Start by reading the scene with get_scene_info, or get_full_context when the editor state matters.",
  "1. Check which asset integrations the add-on has enabled:",
  "   - get_polyhaven_status: generic models, textures and HDRI lighting.",
  "   - get_sketchfab_status: realistic or specific models, wider variety than PolyHaven.",
  "   - get_hyper3d_status and get_hunyuan3d_status: generated models for a single item.",
  "     Do not generate a whole scene, the ground, or separate parts of one item with them.",
  "2. Preferred sources:",
  "   - Specific existing objects: Sketchfab, then PolyHaven.",
  "   - Generic objects and furniture: PolyHaven, then Sketchfab.",
  "   - Unique items missing from the libraries: Hyper3D or Hunyuan3D.",
  "   - Lighting: PolyHaven HDRIs. Materials: PolyHaven textures, or create_material and add_node.",
  "3. Fall back to primitives (add_primitive, add_modifier) or execute_blender_code only when no",
  "   integration fits, or when the user asks for it.",
  "4. After importing or creating anything, check each object's world_bounding_box with get_object_info",
  "   and fix location, rotation and scale so objects sit where they belong and do not clip.",
  "5. A command that timed out may still have run. Read the scene again before retrying it.",
].join("\n");

export function registerBridgePrompts(server: McpServer) {
  server.prompt(ASSET_CREATION_STRATEGY_PROMPT, "Preferred strategy for creating assets in Blender.", () => ({
    messages: [
      {
        role: "user" as const,
        content: { type: "text" as const, text: ASSET_CREATION_STRATEGY },
      },
    ],
  }));
}
