import { NextRequest, NextResponse } from 'next/server';
import { getChatService } from '@/lib/chat-runtime';
import { logger } from '@/lib/logger';
import { DEFAULT_THREAD_ID, chatRequestSchema, parseJsonBody } from './request-schema';

export async function POST(request: NextRequest) {
  const body = await parseJsonBody(request, chatRequestSchema);
  if (!body.ok) {
    return body.response;
  }

  try {
    const service = await getChatService();
    const { response } = await service.handleTurn({
      message: body.data.message,
      threadId: body.data.thread_id,
    });
    return NextResponse.json({ response });
  } catch (error) {
    await logger.error('Chat API error', error);
    return NextResponse.json(
      { error: 'Failed to process chat message' },
      { status: 500 }
    );
  }
}

export async function GET(request: NextRequest) {
  const threadId = request.nextUrl.searchParams.get('thread_id')?.trim() || DEFAULT_THREAD_ID;

  try {
    const service = await getChatService();
    return NextResponse.json({ thread_id: threadId, history: service.history(threadId) });
  } catch (error) {
    await logger.error('Chat history API error', error);
    return NextResponse.json(
      { error: 'Failed to load chat history' },
      { status: 500 }
    );
  }
}
