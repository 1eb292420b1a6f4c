import { NextResponse } from "next/server";
import { STARTED_MESSAGE, validatePdfForm } from "@/lib/api/v1";
import { generationDeps, pdfExecutor } from "@/lib/generation";
import { jobStore } from "@/lib/job-store";

export const dynamic = "force-dynamic";

export async function POST(request: Request) {
  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    return NextResponse.json({ error: "Expected a multipart form body" }, { status: 400 });
  }

  const validated = await validatePdfForm(form);
  if (!validated.ok) {
    return NextResponse.json({ error: validated.error }, { status: 400 });
  }

  const job = jobStore.create();
  console.log(`[job ${job.id}] PDF import`);
  // run() records failures on the job and never rejects
  void jobStore.run(job.id, pdfExecutor(generationDeps(), validated.value));

  return NextResponse.json({ job_id: job.id, message: STARTED_MESSAGE });
}
