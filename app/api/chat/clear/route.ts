import { NextRequest, NextResponse } from 'next/server';
import { getChatService } from '@/lib/chat-runtime';
import { logger } from '@/lib/logger';
import { clearRequestSchema, parseJsonBody } from '../request-schema';

export async function POST(request: NextRequest) {
  const body = await parseJsonBody(request, clearRequestSchema);
  if (!body.ok) {
    return body.response;
  }

  try {
    const service = await getChatService();
    await service.clear(body.data.thread_id);
    return NextResponse.json({ thread_id: body.data.thread_id, cleared: true });
  } catch (error) {
    await logger.error('Clear chat API error', error);
    return NextResponse.json(
      { error: 'Failed to clear chat history' },
      { status: 500 }
    );
  }
}
