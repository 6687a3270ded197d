import type { MemberFormatter } from "../types/platform.js";

export class TemplateRenderError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "TemplateRenderError";
	}
}

const TEMPLATE_TOKEN = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;
const NUMERIC_ID = /^[0-9]+$/;

/**
 * Replaces `{name}` placeholders; `{{` and `}}` produce literal braces
 * @throws TemplateRenderError on an unknown placeholder or an unbalanced brace
 */
export const renderTemplate = (template: string, values: Readonly<Record<string, string>>): string => {
	return template.replace(TEMPLATE_TOKEN, (token: string, name: string | undefined) => {
		if (token === "{{") {
			return "{";
		}
		if (token === "}}") {
			return "}";
		}
		if (name === undefined) {
			throw new TemplateRenderError(`Unbalanced "${token}" in template`);
		}
		const value = Object.hasOwn(values, name) ? values[name] : undefined;
		if (value === undefined) {
			throw new TemplateRenderError(`Unknown placeholder "{${name}}" in template`);
		}
		return value;
	});
};

/**
 * OneBot (CQ code) mention for numeric QQ ids, raw id otherwise
 */
export const formatOneBotMember: MemberFormatter = (userId) => {
	return NUMERIC_ID.test(userId) ? `[CQ:at,qq=${userId}]` : userId;
};

const escapeHtml = (text: string): string => {
	return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
};

/**
 * Telegram HTML mention for numeric user ids, escaped raw id otherwise
 */
export const formatTelegramMember: MemberFormatter = (userId) => {
	return NUMERIC_ID.test(userId) ? `<a href="tg://user?id=${userId}">${userId}</a>` : escapeHtml(userId);
};

export interface LeaveNoticeData {
	groupId: string;
	userId: string;
}

/**
 * Renders the configured leave notice
 * Placeholders: `{member}`, `{user_id}`, `{group_id}`. A broken template is
 * logged and replaced by the built-in text.
 */
export const renderLeaveNotice = (
	template: string,
	data: LeaveNoticeData,
	formatMember: MemberFormatter,
): string => {
	const member = formatMember(data.userId);
	try {
		return renderTemplate(template, {
			member,
			user_id: data.userId,
			group_id: data.groupId,
		});
	} catch (error) {
		console.error("[ERROR] notice-formatter: Failed to render leave notice template, using default", {
			template,
		}, error);
		return `Member ${member} left the group and has been blacklisted.`;
	}
};

export const renderRejectNotice = (member: string): string => {
	return `Blacklisted member ${member} asked to join; the request was rejected automatically.`;
};

export const renderApproveNotice = (member: string): string => {
	return `Join request from ${member} was approved automatically.`;
};

export const formatBlacklistSummary = (count: number): string => {
	if (count === 0) {
		return "No members are blacklisted in this group.";
	}
	if (count === 1) {
		return "1 member is blacklisted in this group.";
	}
	return `${count} members are blacklisted in this group.`;
};
