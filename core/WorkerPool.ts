/*
 * Copyright 2025 The Carpocratian Church of Commonality and Equality, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */
/**
 * WorkerPool - Manages a pool of Node.js worker threads for parallel game batches
 *
 * Features:
 * - Task distribution across CPU cores
 * - Worker recycling after a fixed number of tasks
 * - Failed or crashed tasks reject their promise
 * - Graceful shutdown
 */

import { Worker } from 'worker_threads';
import { cpus } from 'os';
import { pathToFileURL } from 'url';

export interface WorkerMessage {
  type: string;
  taskId: string;
  data?: unknown;
  error?: string;
}

interface WorkerTask {
  id: string;
  type: string;
  data: unknown;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
}

export interface WorkerPoolOptions {
  /** Number of workers (defaults to CPU count) */
  numWorkers?: number;
  /** Worker script, as a file URL or path */
  workerScript: URL | string;
  /** Maximum tasks per worker before restart */
  maxTasksPerWorker?: number;
  /** Enable debug logging */
  debug?: boolean;
}

interface WorkerInfo {
  worker: Worker;
  busy: boolean;
  tasksProcessed: number;
  currentTask?: WorkerTask;
}

function isWorkerMessage(value: unknown): value is WorkerMessage {
  return typeof value === 'object' && value !== null &&
    'type' in value && typeof value.type === 'string' &&
    'taskId' in value && typeof value.taskId === 'string';
}

export class WorkerPool {
  private workers: Map<number, WorkerInfo> = new Map();
  private taskQueue: WorkerTask[] = [];
  private nextWorkerId = 0;
  private nextTaskId = 0;
  private shuttingDown = false;
  private options: Required<Omit<WorkerPoolOptions, 'workerScript'>> & { workerScript: URL };

  constructor(options: WorkerPoolOptions) {
    const script = options.workerScript;
    this.options = {
      numWorkers: Math.max(1, options.numWorkers ?? cpus().length),
      workerScript: typeof script === 'string' ? pathToFileURL(script) : script,
      maxTasksPerWorker: options.maxTasksPerWorker ?? 1000,
      debug: options.debug ?? false,
    };

    this.log(`WorkerPool initialized with ${this.options.numWorkers} workers`);
    for (let i = 0; i < this.options.numWorkers; i++) {
      this.createWorker();
    }
  }

  get size(): number {
    return this.options.numWorkers;
  }

  /**
   * Start a worker thread. Loader hooks do not carry over into workers, so a
   * TypeScript entry gets tsx registered through its own execArgv.
   */
  private spawn(): Worker {
    const script = this.options.workerScript;
    if (script.pathname.endsWith('.ts')) {
      const loader = import.meta.resolve('tsx');
      return new Worker(script, { execArgv: [...process.execArgv, '--import', loader] });
    }
    return new Worker(script);
  }

  private createWorker(): number {
    const workerId = this.nextWorkerId++;
    const worker = this.spawn();

    this.workers.set(workerId, { worker, busy: false, tasksProcessed: 0 });

    worker.on('message', (message: unknown) => {
      if (isWorkerMessage(message)) this.handleWorkerMessage(workerId, message);
    });

    worker.on('error', (error) => {
      this.handleWorkerError(workerId, error);
    });

    worker.on('exit', (code) => {
      this.handleWorkerExit(workerId, code);
    });

    this.log(`Worker ${workerId} created`);
    return workerId;
  }

  private handleWorkerMessage(workerId: number, message: WorkerMessage): void {
    const workerInfo = this.workers.get(workerId);
    if (!workerInfo) return;

    if (message.type === 'result') {
      if (workerInfo.currentTask) {
        workerInfo.currentTask.resolve(message.data);
        workerInfo.tasksProcessed++;
        workerInfo.currentTask = undefined;
      }
    } else if (message.type === 'error') {
      if (workerInfo.currentTask) {
        workerInfo.currentTask.reject(new Error(message.error || 'Worker task failed'));
        workerInfo.currentTask = undefined;
      }
    }

    if (workerInfo.tasksProcessed >= this.options.maxTasksPerWorker) {
      this.log(`Worker ${workerId} reached max tasks, recycling...`);
      this.retire(workerId);
      return;
    }

    workerInfo.busy = false;
    this.processNextTask();
  }

  private handleWorkerError(workerId: number, error: Error): void {
    this.log(`Worker ${workerId} error: ${error.message}`);

    const workerInfo = this.workers.get(workerId);
    if (workerInfo?.currentTask) {
      workerInfo.currentTask.reject(error);
      workerInfo.currentTask = undefined;
    }
  }

  /** Every exit, whether recycled or crashed, is replaced while the pool is open */
  private handleWorkerExit(workerId: number, code: number): void {
    this.log(`Worker ${workerId} exited with code ${code}`);

    const workerInfo = this.workers.get(workerId);
    if (!workerInfo) return;

    workerInfo.currentTask?.reject(new Error(`Worker exited with code ${code}`));
    this.workers.delete(workerId);

    if (!this.shuttingDown) {
      this.createWorker();
      this.processNextTask();
    }
  }

  /** Take a worker out of rotation; its exit handler starts the replacement */
  private retire(workerId: number): void {
    const workerInfo = this.workers.get(workerId);
    if (!workerInfo) return;
    workerInfo.busy = true;
    workerInfo.worker.terminate().catch((error: Error) => this.log(`Worker ${workerId} terminate failed: ${error.message}`));
  }

  /**
   * Execute a task on an available worker. The result is whatever the
   * worker posted; callers validate its shape.
   */
  public execute<T>(type: string, data: T): Promise<unknown> {
    if (this.shuttingDown) {
      return Promise.reject(new Error('WorkerPool is shutting down'));
    }

    return new Promise((resolve, reject) => {
      this.taskQueue.push({ id: `task-${this.nextTaskId++}`, type, data, resolve, reject });
      this.processNextTask();
    });
  }

  private processNextTask(): void {
    if (this.taskQueue.length === 0) return;

    let idle: [number, WorkerInfo] | undefined;
    for (const entry of this.workers) {
      if (!entry[1].busy) {
        idle = entry;
        break;
      }
    }
    if (!idle) return;

    const task = this.taskQueue.shift();
    if (!task) return;

    const [workerId, workerInfo] = idle;
    workerInfo.busy = true;
    workerInfo.currentTask = task;

    this.log(`Assigning task ${task.id} (${task.type}) to worker ${workerId}`);
    workerInfo.worker.postMessage({ type: task.type, taskId: task.id, data: task.data });
  }

  /**
   * Execute multiple tasks in parallel, results in input order
   */
  public executeParallel<T>(type: string, dataArray: T[]): Promise<unknown[]> {
    return Promise.all(dataArray.map(data => this.execute(type, data)));
  }

  /**
   * Graceful shutdown: queued tasks are rejected, workers terminated
   */
  public async shutdown(): Promise<void> {
    this.shuttingDown = true;
    this.log('WorkerPool shutting down...');

    for (const task of this.taskQueue) {
      task.reject(new Error('WorkerPool shutdown before task could be processed'));
    }
    this.taskQueue = [];

    await Promise.all(Array.from(this.workers.values()).map(info => info.worker.terminate()));
    this.workers.clear();

    this.log('WorkerPool shutdown complete');
  }

  private log(message: string): void {
    if (this.options.debug) {
      console.log(`[WorkerPool] ${message}`);
    }
  }
}
