import { NextResponse } from 'next/server';
import { getChatService } from '@/lib/chat-runtime';
import { DataUnavailableError } from '@/lib/errors';
import { logger } from '@/lib/logger';

export async function GET() {
  try {
    const service = await getChatService();
    const { context, tools } = await service.describe();

    return NextResponse.json({
      table: context.tableName,
      rowCount: context.rowCount,
      columns: context.columns,
      sampleRows: context.sampleRows,
      groupings: context.groupings,
      whitelist: context.whitelist,
      tools: tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        aliases: tool.aliases,
        parameters: tool.parameters,
      })),
    });
  } catch (error) {
    await logger.error('Schema API error', error);
    if (error instanceof DataUnavailableError) {
      return NextResponse.json({ error: 'Dataset is unavailable' }, { status: 503 });
    }
    return NextResponse.json(
      { error: 'Failed to describe schema' },
      { status: 500 }
    );
  }
}
