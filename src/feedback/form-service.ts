/**
 * Form Service
 *
 * Form and response operations. Each operation that targets an existing form
 * fails with FormNotFoundError when the form is absent.
 */

import { FormRepository } from '../data/form-repository';
import { ResponseRepository } from '../data/response-repository';
import {
  CreateFormInput,
  CreateResponseInput,
  FormRecord,
  ResponseRecord,
  UpdateFormInput,
} from '../data/types';
import { FormNotFoundError } from '../errors/types';

export interface FormServiceDependencies {
  forms: FormRepository;
  responses: ResponseRepository;
}

export class FormService {
  private readonly forms: FormRepository;
  private readonly responses: ResponseRepository;

  constructor(deps: FormServiceDependencies) {
    this.forms = deps.forms;
    this.responses = deps.responses;
  }

  async createForm(input: CreateFormInput): Promise<FormRecord> {
    return this.forms.createForm(input);
  }

  async getForm(formId: string): Promise<FormRecord> {
    const form = await this.forms.getForm(formId);
    if (!form) {
      throw new FormNotFoundError(formId);
    }
    return form;
  }

  async updateForm(formId: string, input: UpdateFormInput): Promise<FormRecord> {
    const form = await this.forms.updateForm(formId, input);
    if (!form) {
      throw new FormNotFoundError(formId);
    }
    return form;
  }

  async deleteForm(formId: string): Promise<void> {
    const deleted = await this.forms.deleteForm(formId);
    if (!deleted) {
      throw new FormNotFoundError(formId);
    }
  }

  async submitResponse(formId: string, input: CreateResponseInput): Promise<ResponseRecord> {
    const response = await this.responses.createResponse(formId, input);
    if (!response) {
      throw new FormNotFoundError(formId);
    }
    return response;
  }

  async listResponses(formId: string): Promise<ResponseRecord[]> {
    await this.getForm(formId);
    return this.responses.listResponses(formId);
  }
}
