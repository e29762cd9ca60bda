import { NextRequest, NextResponse } from "next/server";
import { startStoryBodySchema } from "@/lib/story/scenes";
import { getStoryService } from "@/lib/story/runtime";

export async function POST(req: NextRequest) {
  const body = await req.json().catch(() => ({}));
  const parsed = startStoryBodySchema.safeParse(body);
  if (!parsed.success) {
    const firstError = parsed.error.issues[0];
    console.log(`[story] rejected story request: ${firstError?.message || "Invalid input"}`);
    return NextResponse.json({ error: firstError?.message || "Invalid input" }, { status: 400 });
  }

  try {
    const { storyId } = getStoryService().startStory(parsed.data);
    return NextResponse.json({
      status: "ok",
      storyId,
      message: "Story generation started successfully",
    });
  } catch (error) {
    console.error("[story] failed to start story generation:", error);
    return NextResponse.json(
      { error: "Failed to start story generation", details: error instanceof Error ? error.message : "Unknown error" },
      { status: 500 },
    );
  }
}
