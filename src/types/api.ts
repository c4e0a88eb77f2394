export interface ApiResponse<T = unknown> {
    success: boolean;
    data?: T;
    message?: string;
    error?: string;
    timestamp: string;
}

export interface ErrorResponse {
    status: string;
    message: string;
    timestamp: string;
    path?: string;
    method?: string;
    stack?: string;
}

export interface HealthCheckResponse {
    status: 'OK' | 'ERROR';
    timestamp: string;
    uptime: number;
    memory: NodeJS.MemoryUsage;
    version: string;
}
