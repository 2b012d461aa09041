// lib/http.ts

import { NextResponse } from 'next/server';
import { InvalidQueryError, ScrapeError, errorMessage } from './errors';

export function statusForError(error: unknown): number {
  if (error instanceof InvalidQueryError) return 400;
  if (error instanceof ScrapeError) return 502;
  return 500;
}

export function errorResponse(error: unknown, fallback: string): NextResponse {
  console.error(error);
  return NextResponse.json(
    { error: errorMessage(error, fallback) },
    { status: statusForError(error) }
  );
}
