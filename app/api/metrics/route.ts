import { register } from '../../../lib/metrics';

export const dynamic = 'force-dynamic';

export async function GET() {
  const body = await register.metrics();
  return new Response(body, { headers: { 'Content-Type': register.contentType } });
}
