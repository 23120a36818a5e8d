import { RouteResponse } from '../../../../src/http/response.ts';
import type { RouteRequest } from '../../../../src/http/request.ts';
import { toUser } from '../_shared/user.util.ts';

export function GET() {
  return RouteResponse.json([{ id: '1', name: 'Ada' }]);
}

export function POST(req: RouteRequest) {
  return RouteResponse.json(toUser(req.json()), { status: 201 });
}
